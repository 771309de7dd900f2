/**
 * Shell process runner
 *
 * Commands run under bash with pipefail. Standard output and standard error
 * are merged into one line stream that is logged as it arrives and kept in a
 * bounded buffer for the failure message.
 */

import { spawn } from 'child_process';
import type { ChildProcess } from 'child_process';
import { randomBytes } from 'crypto';
import * as fs from 'fs/promises';
import * as path from 'path';
import { createInterface } from 'readline';
import { PassThrough } from 'stream';
import type { Readable } from 'stream';
import type {
  CommandResult,
  ExecuteOptions,
  ExecutionState,
  FailedCommandResult,
  SucceededCommandResult,
} from './types.js';
import type { RunnerConfig, RunnerConfigInput } from './config.js';
import { parseRunnerConfig } from './config.js';
import { CommandError, InvalidStateError, toIOError } from './errors.js';
import { LogBuffer } from './logBuffer.js';
import type { Logger } from './logger.js';
import { getDefaultLogger } from './defaults.js';

/** Merge stderr into stdout and fail pipelines on any failing stage */
const SHELL_PRELUDE = ['exec 2>&1', 'set -o pipefail'];

interface ExitStatus {
  code: number | null;
  signal: NodeJS.Signals | null;
}

type Quote = '"' | "'" | null;

interface HeredocMarker {
  delimiter: string;
  /** `<<-` strips leading tabs before matching the delimiter */
  stripTabs: boolean;
}

interface ScannedLine {
  words: string[];
  /** Quote still open at the end of the line */
  quote: Quote;
  heredocs: HeredocMarker[];
}

const HEREDOC_OPERATOR = /^<<(-?)[ \t]*((?:'[^']*'|"[^"]*"|\\.|[^\s;&|<>()'"\\])+)/;

function readHeredocMarker(rest: string): HeredocMarker | undefined {
  const match = HEREDOC_OPERATOR.exec(rest);
  const word = match?.[2];
  if (match === null || word === undefined) return undefined;
  return { delimiter: word.replace(/['"\\]/g, ''), stripTabs: match[1] === '-' };
}

/**
 * Split one line of a shell command into words at unquoted whitespace,
 * starting in the given quote state.
 *
 * Quoted and escaped text stays inside its word; an unquoted comment runs to
 * the end of the line as a single word.
 */
function scanLine(line: string, openQuote: Quote): ScannedLine {
  const words: string[] = [];
  const heredocs: HeredocMarker[] = [];
  let word = '';
  let quote = openQuote;

  const flush = (): void => {
    if (word) words.push(word);
    word = '';
  };

  for (let i = 0; i < line.length; i++) {
    const ch = line.charAt(i);
    if (quote === "'") {
      word += ch;
      if (ch === "'") quote = null;
    } else if (ch === '\\' && i + 1 < line.length) {
      word += ch + line.charAt(i + 1);
      i += 1;
    } else if (quote === '"') {
      word += ch;
      if (ch === '"') quote = null;
    } else if (ch === '"' || ch === "'") {
      word += ch;
      quote = ch;
    } else if (ch === '#' && word === '') {
      word = line.slice(i);
      break;
    } else if (ch === ' ' || ch === '\t') {
      flush();
    } else {
      if (ch === '<' && line.startsWith('<<', i) && !line.startsWith('<<<', i) && line.charAt(i - 1) !== '<') {
        const marker = readHeredocMarker(line.slice(i));
        if (marker) heredocs.push(marker);
      }
      word += ch;
    }
  }
  flush();
  return { words, quote, heredocs };
}

function breakLine(line: string, words: readonly string[], width: number): string[] {
  const indent = /^[ \t]*/.exec(line)?.[0] ?? '';
  const lines: string[] = [];
  let current = '';

  for (const word of words) {
    if (!current) {
      current = indent + word;
    } else if (current.length + 1 + word.length > width) {
      lines.push(`${current} \\`);
      current = indent + word;
    } else {
      current = `${current} ${word}`;
    }
  }
  lines.push(current);
  return lines;
}

/**
 * Wrap the over-long lines of a shell command onto several lines joined by
 * backslash continuations. Breaks happen only between unquoted words, and
 * words longer than width stay whole.
 *
 * Lines within width, heredoc bodies, lines inside a multi-line quote and
 * lines already ending in a continuation are kept byte for byte.
 */
export function wrapCommand(command: string, width: number): string {
  const out: string[] = [];
  const pending: HeredocMarker[] = [];
  let heredoc: HeredocMarker | undefined;
  let quote: Quote = null;

  for (const line of command.split('\n')) {
    if (heredoc) {
      out.push(line);
      const body = heredoc.stripTabs ? line.replace(/^\t+/, '') : line;
      if (body === heredoc.delimiter) heredoc = pending.shift();
      continue;
    }

    const startsQuoted = quote !== null;
    const scanned = scanLine(line, quote);
    quote = scanned.quote;
    pending.push(...scanned.heredocs);
    heredoc = pending.shift();

    const verbatim = line.length <= width || startsQuoted || quote !== null || line.endsWith('\\');
    out.push(...(verbatim ? [line] : breakLine(line, scanned.words, width)));
  }
  return out.join('\n');
}

function waitForExit(child: ChildProcess): Promise<ExitStatus> {
  return new Promise((resolve, reject) => {
    child.once('error', reject);
    child.once('exit', (code, signal) => resolve({ code, signal }));
  });
}

/**
 * Read the merged stdout/stderr of child line by line until both close
 */
async function drainLines(child: ChildProcess, onLine: (line: string) => void): Promise<void> {
  const merged = new PassThrough();
  const sources = [child.stdout, child.stderr].filter((s): s is Readable => s !== null);

  let open = sources.length;
  if (open === 0) merged.end();
  for (const source of sources) {
    source.pipe(merged, { end: false });
    source.once('close', () => {
      open -= 1;
      if (open === 0) merged.end();
    });
  }

  const lines = createInterface({ input: merged, crlfDelay: Infinity });
  for await (const line of lines) {
    onLine(line);
  }
}

/**
 * A single run of a command: not-started -> running -> succeeded | failed
 */
export class ShellExecution {
  private currentState: ExecutionState = 'not-started';

  constructor(
    readonly command: string,
    private readonly config: RunnerConfig,
    private readonly logger: Logger,
    private readonly options: ExecuteOptions = {}
  ) {}

  get state(): ExecutionState {
    return this.currentState;
  }

  /**
   * Run the command to completion. Resolves with the result for any exit
   * status; rejects only when the shell cannot be started.
   */
  async start(): Promise<CommandResult> {
    if (this.currentState !== 'not-started') {
      throw new InvalidStateError(`Execution already ${this.currentState}: ${this.command}`);
    }
    this.currentState = 'running';

    let result: CommandResult;
    try {
      result = await this.spawnAndWait();
    } catch (err) {
      this.currentState = 'failed';
      throw err;
    }
    this.currentState = result.success ? 'succeeded' : 'failed';
    return result;
  }

  private async writeScript(scriptDir: string): Promise<string> {
    const scriptPath = path.join(scriptDir, `.txrun-${randomBytes(4).toString('hex')}.sh`);
    const body = [...SHELL_PRELUDE, wrapCommand(this.command, this.config.scriptWrapWidth)].join('\n');
    try {
      await fs.writeFile(scriptPath, `${body}\n`, { mode: 0o700 });
    } catch (err) {
      throw toIOError(err, `Failed to write command script in ${scriptDir}`);
    }
    return scriptPath;
  }

  private async spawnAndWait(): Promise<CommandResult> {
    const { scriptDir } = this.options;
    const scriptPath = scriptDir === undefined ? undefined : await this.writeScript(scriptDir);

    try {
      const args = scriptPath === undefined ? ['-c', `${SHELL_PRELUDE.join('; ')}; ${this.command}`] : [scriptPath];
      return await this.runShell(args);
    } finally {
      if (scriptPath !== undefined) {
        await fs.rm(scriptPath, { force: true });
      }
    }
  }

  private async runShell(args: string[]): Promise<CommandResult> {
    const { timeoutMs, shell } = this.config;
    // A process group lets a timeout reach grandchildren holding the pipe open
    const child = spawn(shell, args, {
      stdio: ['ignore', 'pipe', 'pipe'],
      detached: timeoutMs !== undefined,
    });

    const buffer = new LogBuffer(this.config.logBufferSize);
    const exited = waitForExit(child);
    const drained = drainLines(child, (line) => {
      this.logger.info(line);
      buffer.push(line);
    });

    let timedOut = false;
    const timer =
      timeoutMs === undefined
        ? undefined
        : setTimeout(() => {
            timedOut = true;
            this.logger.warn({ timeoutMs, pid: child.pid }, 'Command timed out, terminating');
            this.terminate(child);
          }, timeoutMs);

    let status: ExitStatus;
    try {
      [status] = await Promise.all([exited, drained]);
    } catch (err) {
      child.stdout?.destroy();
      child.stderr?.destroy();
      throw toIOError(err, `Failed to run ${shell}`);
    } finally {
      if (timer !== undefined) clearTimeout(timer);
    }

    if (status.code === 0 && !timedOut) {
      return { success: true, command: this.command, exitCode: 0 };
    }
    const failed: FailedCommandResult = {
      success: false,
      command: this.command,
      exitCode: status.code,
      signal: status.signal,
      timedOut,
      logLines: buffer.toArray(),
    };
    return failed;
  }

  private terminate(child: ChildProcess): void {
    if (child.pid === undefined) return;
    try {
      process.kill(-child.pid, 'SIGTERM');
    } catch (err) {
      this.logger.warn({ err, pid: child.pid }, 'Failed to signal process group, signalling shell only');
      child.kill('SIGTERM');
    }
  }
}

export interface ProcessRunnerOptions {
  logger?: Logger;
  config?: RunnerConfigInput;
}

/**
 * Runs shell commands with merged, line-logged output
 */
export class ProcessRunner {
  readonly config: RunnerConfig;
  private readonly logger: Logger;

  constructor(options: ProcessRunnerOptions = {}) {
    this.config = parseRunnerConfig(options.config);
    this.logger = (options.logger ?? getDefaultLogger()).child({ component: 'process-runner' });
  }

  /**
   * Run a command and report its result without throwing on failure
   */
  async execute(command: string, options: ExecuteOptions = {}): Promise<CommandResult> {
    const execution = new ShellExecution(command, this.config, this.logger, options);
    return execution.start();
  }

  /**
   * Run a command, throwing CommandError (after logging it) on failure
   */
  async run(command: string, options: ExecuteOptions = {}): Promise<SucceededCommandResult> {
    const result = await this.execute(command, options);
    if (result.success) {
      return result;
    }
    const error = new CommandError(result);
    this.logger.error(
      { err: error, exitCode: result.exitCode, signal: result.signal, timedOut: result.timedOut },
      error.message
    );
    throw error;
  }
}
