/**
 * txrun core - idempotent, transactional runs of external commands
 *
 * Core concepts:
 * - A step whose outputs exist and are non-empty is skipped
 * - Outputs are staged privately and renamed into place on success only
 * - Command output is logged live and its tail kept for failure messages
 */

export { CommandRunner, runCommand, quoteShellArg } from './commandRunner.js';
export { ProcessRunner, ShellExecution, wrapCommand } from './processRunner.js';
export type { ProcessRunnerOptions } from './processRunner.js';

export {
  createTempDir,
  stageFiles,
  promoteFiles,
  movePath,
  withTempDir,
  withTxFile,
  withTxFiles,
} from './transaction.js';

export { needsRun, isUpToDate } from './idempotent.js';
export { fileKey, isFileKey, lookupFile, substituteKeys } from './fileInfo.js';
export { LogBuffer } from './logBuffer.js';

export {
  parentDirectory,
  baseName,
  exists,
  isDirectory,
  fileSize,
  modifiedTime,
  fileRoot,
  addFilePart,
  removeFilePart,
  removeZipExt,
  absPath,
  removePath,
} from './paths.js';

export {
  TxRunError,
  IOError,
  InvalidStateError,
  CommandError,
  errorCodeOf,
  formatCommandFailure,
} from './errors.js';
export type { TxRunErrorCode } from './errors.js';

export {
  runnerConfigSchema,
  parseRunnerConfig,
  loadRunnerConfig,
  formatZodError,
  DEFAULT_LOG_BUFFER_SIZE,
  DEFAULT_TX_PREFIX,
} from './config.js';
export type { RunnerConfig, RunnerConfigInput } from './config.js';

export { createLogger, createSilentLogger, LOG_LEVELS } from './logger.js';
export { getDefaultConfig, getDefaultLogger } from './defaults.js';
export type { Logger, LogLevel, CreateLoggerOptions } from './logger.js';

export type {
  PathInput,
  FileKey,
  FileInfo,
  ArgToken,
  ExecutionState,
  CommandResult,
  SucceededCommandResult,
  FailedCommandResult,
  ExecuteOptions,
  TransactionOptions,
  StagedFiles,
  CommandTemplate,
  CommandInput,
  RunCommandOptions,
  RunCommandFilesParams,
} from './types.js';
