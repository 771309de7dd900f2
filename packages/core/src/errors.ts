/**
 * Error types raised by txrun
 */

import type { FailedCommandResult } from './types.js';

export type TxRunErrorCode = 'IO_ERROR' | 'INVALID_STATE' | 'COMMAND_FAILED';

/**
 * Base class for every error txrun raises
 */
export class TxRunError extends Error {
  readonly code: TxRunErrorCode;

  constructor(code: TxRunErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * A filesystem operation failed (directory creation, rename, stat, permissions)
 */
export class IOError extends TxRunError {
  /** Node error code of the underlying failure, e.g. ENOENT or EACCES */
  readonly errno: string | undefined;

  constructor(message: string, options?: { cause?: unknown }) {
    super('IO_ERROR', message, options);
    this.errno = errorCodeOf(options?.cause);
  }
}

/**
 * A precondition of the caller was violated
 */
export class InvalidStateError extends TxRunError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('INVALID_STATE', message, options);
  }
}

/**
 * A shell command exited non-zero, was killed, or timed out
 */
export class CommandError extends TxRunError {
  readonly command: string;
  readonly exitCode: number | null;
  readonly signal: NodeJS.Signals | null;
  readonly timedOut: boolean;
  /** Most recent output lines, oldest first */
  readonly logLines: readonly string[];

  constructor(result: FailedCommandResult) {
    super('COMMAND_FAILED', formatCommandFailure(result.command, result.logLines));
    this.command = result.command;
    this.exitCode = result.exitCode;
    this.signal = result.signal;
    this.timedOut = result.timedOut;
    this.logLines = result.logLines;
  }
}

export function formatCommandFailure(command: string, logLines: readonly string[]): string {
  return `Shell command failed: ${command}\n${logLines.join('\n')}`;
}

/**
 * Extract the `code` property Node attaches to system errors
 */
export function errorCodeOf(err: unknown): string | undefined {
  if (err && typeof err === 'object' && 'code' in err) {
    const { code } = err;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

/**
 * Wrap a filesystem failure into an IOError, keeping our own errors as they are
 */
export function toIOError(err: unknown, message: string): TxRunError {
  if (err instanceof TxRunError) {
    return err;
  }
  const detail = err instanceof Error ? err.message : String(err);
  return new IOError(`${message}: ${detail}`, { cause: err });
}
