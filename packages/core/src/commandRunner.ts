/**
 * CommandRunner - idempotent, transactional command execution
 *
 * A command is skipped when its outputs already exist and are non-empty.
 * Otherwise it runs against staged output paths, which are renamed into
 * place only after the command exits 0.
 */

import { fileURLToPath } from 'url';
import type {
  ArgToken,
  CommandInput,
  RunCommandFilesParams,
  RunCommandOptions,
} from './types.js';
import type { RunnerConfig } from './config.js';
import { InvalidStateError } from './errors.js';
import { isFileKey, lookupFile, substituteKeys } from './fileInfo.js';
import { needsRun } from './idempotent.js';
import type { Logger } from './logger.js';
import { getDefaultConfig, getDefaultLogger } from './defaults.js';
import { ProcessRunner } from './processRunner.js';
import type { ProcessRunnerOptions } from './processRunner.js';
import { withTxFile, withTxFiles } from './transaction.js';

/** Characters that never need quoting in a shell word */
const SHELL_SAFE = /^[A-Za-z0-9_@%+=:,./-]+$/;

/**
 * Quote a value as a single shell word
 */
export function quoteShellArg(value: string): string {
  if (value !== '' && SHELL_SAFE.test(value)) return value;
  return `'${value.split("'").join(`'\\''`)}'`;
}

function resolveOutputPath(outputPath: string | URL): string {
  const resolved = typeof outputPath === 'string' ? outputPath : fileURLToPath(outputPath);
  if (!resolved) {
    throw new InvalidStateError('Output path must be a non-empty string');
  }
  return resolved;
}

function buildCommand<TParams>(command: CommandInput<TParams>): string {
  return typeof command === 'string' ? command : command.build(command.params);
}

/**
 * Join tokens into a command line; paths substituted for keys are quoted,
 * literal tokens are shell text and used as given
 */
function renderArgs(original: readonly ArgToken[], substituted: readonly ArgToken[]): string {
  return substituted
    .map((token, i) => {
      if (isFileKey(token)) {
        throw new InvalidStateError(`No file is mapped to key "${token.name}"`);
      }
      return isFileKey(original[i]) ? quoteShellArg(token) : token;
    })
    .join(' ');
}

export class CommandRunner {
  private readonly processRunner: ProcessRunner;
  private readonly logger: Logger;

  constructor(options: ProcessRunnerOptions = {}) {
    const logger = options.logger ?? getDefaultLogger();
    this.processRunner = new ProcessRunner({ ...options, logger });
    this.logger = logger.child({ component: 'command-runner' });
  }

  get config(): RunnerConfig {
    return this.processRunner.config;
  }

  /**
   * Run a command producing outputPath, unless outputPath already exists and
   * is non-empty.
   *
   * Every occurrence of outputPath in the command text is redirected to the
   * staged path, so the command can be written against the final name.
   *
   * @returns outputPath, whether or not the command ran
   */
  async runCommand<TParams>(
    outputPath: string | URL,
    command: CommandInput<TParams>,
    options: RunCommandOptions = {}
  ): Promise<string> {
    const outFile = resolveOutputPath(outputPath);

    if (!(await needsRun(outFile))) {
      this.logger.debug({ outFile }, 'Output exists, skipping command');
      return outFile;
    }

    await withTxFile(
      outFile,
      async (txOutFile, txDir) => {
        const txCommand = buildCommand(command).split(outFile).join(txOutFile);
        await this.processRunner.run(txCommand, { scriptDir: txDir });
      },
      {
        sideExtensions: options.sideExtensions ?? [],
        prefix: this.config.txPrefix,
        logger: this.logger,
      }
    );
    return outFile;
  }

  /**
   * Run a command producing several outputs that appear together or not at
   * all. Keys in args resolve to staged paths for outputs and to their
   * mapped paths for everything else. Without output keys the command always
   * runs.
   *
   * @returns final paths of the output keys, in order
   */
  async runCommandFiles(params: RunCommandFilesParams): Promise<string[]> {
    const { fileInfo, outputKeys, args } = params;

    const outputPaths = outputKeys.map((key) => {
      const outPath = lookupFile(fileInfo, key);
      if (outPath === undefined) {
        throw new InvalidStateError(`Output key "${key}" is not present in file info`);
      }
      return outPath;
    });

    if (outputPaths.length > 0 && !(await needsRun(outputPaths))) {
      this.logger.debug({ outputs: outputPaths }, 'Outputs exist, skipping command');
      return outputPaths;
    }

    await withTxFiles(
      fileInfo,
      outputKeys,
      async (staged) => {
        const command = renderArgs(args, substituteKeys(args, staged));
        await this.processRunner.run(command);
      },
      {
        sideExtensions: params.sideExtensions ?? [],
        prefix: this.config.txPrefix,
        logger: this.logger,
      }
    );
    return outputPaths;
  }
}

let defaultRunner: CommandRunner | undefined;

/**
 * runCommand on a shared runner using the default logger and configuration
 */
export function runCommand<TParams>(
  outputPath: string | URL,
  command: CommandInput<TParams>,
  options?: RunCommandOptions
): Promise<string> {
  defaultRunner ??= new CommandRunner({ config: getDefaultConfig() });
  return defaultRunner.runCommand(outputPath, command, options);
}
