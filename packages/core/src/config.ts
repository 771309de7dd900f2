/**
 * Runner configuration
 *
 * Values come from code or from TXRUN_* environment variables. There is no
 * configuration file.
 */

import { z } from 'zod';
import type { ZodError } from 'zod';
import { InvalidStateError } from './errors.js';
import { LOG_LEVELS } from './logger.js';

/** Number of output lines kept for failure diagnostics */
export const DEFAULT_LOG_BUFFER_SIZE = 100;

/** Prefix of transaction directories, recognizable when left behind by a killed process */
export const DEFAULT_TX_PREFIX = 'txtmp';

export const runnerConfigSchema = z.object({
  logLevel: z.enum(LOG_LEVELS).default('info').describe('Minimum level written by the default logger'),
  logBufferSize: z
    .number()
    .int()
    .positive()
    .default(DEFAULT_LOG_BUFFER_SIZE)
    .describe('Output lines retained for failure messages'),
  shell: z.string().min(1).default('bash').describe('Shell used to run commands, must understand pipefail'),
  txPrefix: z
    .string()
    .min(1)
    .regex(/^[^/\\]+$/, 'must not contain path separators')
    .default(DEFAULT_TX_PREFIX)
    .describe('Name prefix of transaction directories'),
  scriptWrapWidth: z
    .number()
    .int()
    .min(20)
    .default(80)
    .describe('Target line width of generated command scripts'),
  timeoutMs: z
    .number()
    .int()
    .positive()
    .optional()
    .describe('Kill commands running longer than this; unset waits forever'),
});

export type RunnerConfig = z.infer<typeof runnerConfigSchema>;
export type RunnerConfigInput = z.input<typeof runnerConfigSchema>;

export function formatZodError(error: ZodError): string {
  const issues = error.issues ?? [];
  if (!issues.length) return error.message;
  return issues
    .map((issue) => {
      const path = issue.path?.length ? issue.path.join('.') : '';
      return path ? `${path}: ${issue.message}` : issue.message;
    })
    .join('; ');
}

/**
 * Validate a partial configuration and fill in defaults
 */
export function parseRunnerConfig(input: RunnerConfigInput = {}): RunnerConfig {
  const parsed = runnerConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidStateError(`Invalid runner config: ${formatZodError(parsed.error)}`);
  }
  return parsed.data;
}

function parseIntegerVar(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name]?.trim();
  if (!raw) return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new InvalidStateError(`${name} must be an integer, got "${raw}"`);
  }
  return value;
}

/**
 * Build configuration from TXRUN_* environment variables
 *
 * TXRUN_LOG_LEVEL, TXRUN_LOG_BUFFER_SIZE, TXRUN_SHELL, TXRUN_TX_PREFIX,
 * TXRUN_SCRIPT_WRAP_WIDTH, TXRUN_TIMEOUT_MS
 */
export function loadRunnerConfig(env: NodeJS.ProcessEnv = process.env): RunnerConfig {
  const input: Record<string, unknown> = {};

  const logLevel = env['TXRUN_LOG_LEVEL']?.trim().toLowerCase();
  if (logLevel) input['logLevel'] = logLevel;

  const shell = env['TXRUN_SHELL']?.trim();
  if (shell) input['shell'] = shell;

  const txPrefix = env['TXRUN_TX_PREFIX']?.trim();
  if (txPrefix) input['txPrefix'] = txPrefix;

  const logBufferSize = parseIntegerVar(env, 'TXRUN_LOG_BUFFER_SIZE');
  if (logBufferSize !== undefined) input['logBufferSize'] = logBufferSize;

  const scriptWrapWidth = parseIntegerVar(env, 'TXRUN_SCRIPT_WRAP_WIDTH');
  if (scriptWrapWidth !== undefined) input['scriptWrapWidth'] = scriptWrapWidth;

  const timeoutMs = parseIntegerVar(env, 'TXRUN_TIMEOUT_MS');
  if (timeoutMs !== undefined) input['timeoutMs'] = timeoutMs;

  const parsed = runnerConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidStateError(`Invalid TXRUN_* environment: ${formatZodError(parsed.error)}`);
  }
  return parsed.data;
}
