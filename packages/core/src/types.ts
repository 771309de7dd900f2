/**
 * txrun type definitions
 */

import type { Logger } from './logger.js';

/**
 * One or more paths, arbitrarily nested; flattened before use
 */
export type PathInput = string | readonly PathInput[];

/**
 * Symbolic reference to an output slot in a FileInfo
 */
export interface FileKey {
  readonly kind: 'file-key';
  readonly name: string;
}

/**
 * Ordered mapping from slot name to file path
 */
export type FileInfo = Readonly<Record<string, string>>;

/**
 * Argument token: literal shell text or a slot to resolve against a FileInfo
 */
export type ArgToken = string | FileKey;

/**
 * Lifecycle of a single shell execution
 */
export type ExecutionState = 'not-started' | 'running' | 'succeeded' | 'failed';

export interface SucceededCommandResult {
  success: true;
  command: string;
  exitCode: 0;
}

export interface FailedCommandResult {
  success: false;
  command: string;
  /** null when the process was terminated by a signal */
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  /** Whether the configured timeout killed the process */
  timedOut: boolean;
  /** Most recent output lines, oldest first */
  logLines: string[];
}

export type CommandResult = SucceededCommandResult | FailedCommandResult;

export interface ExecuteOptions {
  /**
   * Write the command into a script in this directory and run the script,
   * for commands longer than the OS argument limit allows
   */
  scriptDir?: string;
}

export interface TransactionOptions {
  /** Suffixes of sidecar files promoted alongside each output, e.g. '.bai' */
  sideExtensions?: readonly string[];
  /** Name prefix of the transaction directory, default 'txtmp' */
  prefix?: string;
  /** Receives cleanup warnings, default the shared stderr logger */
  logger?: Logger;
}

export interface StagedFiles {
  /** Copy of the input FileInfo with transactional keys pointing into txDir */
  staged: FileInfo;
  txDir: string;
}

/**
 * Typed replacement for string interpolation: the builder receives exactly
 * the values it needs
 */
export interface CommandTemplate<TParams> {
  build: (params: TParams) => string;
  params: TParams;
}

export type CommandInput<TParams> = string | CommandTemplate<TParams>;

export interface RunCommandOptions {
  /** Sidecar suffixes promoted with the output, e.g. ['.tbi'] */
  sideExtensions?: readonly string[];
}

export interface RunCommandFilesParams {
  fileInfo: FileInfo;
  /** Keys of fileInfo the command produces; staged together and promoted as a set */
  outputKeys: readonly string[];
  /** Command tokens; FileKeys are replaced by (staged) paths */
  args: readonly ArgToken[];
  sideExtensions?: readonly string[];
}
