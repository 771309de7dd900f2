/**
 * Process-wide defaults for callers that pass no logger or configuration
 */

import type { RunnerConfig } from './config.js';
import { loadRunnerConfig } from './config.js';
import type { Logger } from './logger.js';
import { createLogger } from './logger.js';

let defaultConfig: RunnerConfig | undefined;
let defaultLogger: Logger | undefined;

/**
 * Configuration from TXRUN_* variables, read once
 */
export function getDefaultConfig(): RunnerConfig {
  defaultConfig ??= loadRunnerConfig();
  return defaultConfig;
}

/**
 * Shared stderr logger at the configured level
 */
export function getDefaultLogger(): Logger {
  defaultLogger ??= createLogger({ level: getDefaultConfig().logLevel });
  return defaultLogger;
}
