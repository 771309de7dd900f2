/**
 * Runner configuration tests
 */

import { describe, it, expect, afterEach, vi } from 'vitest';
import { loadRunnerConfig, parseRunnerConfig } from '../config.js';
import { InvalidStateError } from '../errors.js';

describe('parseRunnerConfig', () => {
  it('should fill in defaults', () => {
    const config = parseRunnerConfig();

    expect(config.logLevel).toBe('info');
    expect(config.logBufferSize).toBe(100);
    expect(config.shell).toBe('bash');
    expect(config.txPrefix).toBe('txtmp');
    expect(config.scriptWrapWidth).toBe(80);
    expect(config.timeoutMs).toBeUndefined();
  });

  it('should keep given values', () => {
    const config = parseRunnerConfig({ logBufferSize: 10, timeoutMs: 1000, txPrefix: 'stage' });

    expect(config.logBufferSize).toBe(10);
    expect(config.timeoutMs).toBe(1000);
    expect(config.txPrefix).toBe('stage');
  });

  it('should reject invalid values with the offending field', () => {
    expect(() => parseRunnerConfig({ logBufferSize: 0 })).toThrow(InvalidStateError);
    expect(() => parseRunnerConfig({ logBufferSize: 0 })).toThrow(/logBufferSize/);
    expect(() => parseRunnerConfig({ txPrefix: 'a/b' })).toThrow(/txPrefix: must not contain path separators/);
  });
});

describe('loadRunnerConfig', () => {
  it('should read TXRUN_* variables', () => {
    const config = loadRunnerConfig({
      TXRUN_LOG_LEVEL: 'DEBUG',
      TXRUN_LOG_BUFFER_SIZE: '20',
      TXRUN_TIMEOUT_MS: '500',
      TXRUN_SHELL: '/bin/bash',
    });

    expect(config.logLevel).toBe('debug');
    expect(config.logBufferSize).toBe(20);
    expect(config.timeoutMs).toBe(500);
    expect(config.shell).toBe('/bin/bash');
  });

  it('should use defaults for an empty environment', () => {
    expect(loadRunnerConfig({})).toEqual(parseRunnerConfig());
  });

  it('should reject non-integer numbers', () => {
    expect(() => loadRunnerConfig({ TXRUN_TIMEOUT_MS: 'soon' })).toThrow(
      'TXRUN_TIMEOUT_MS must be an integer, got "soon"'
    );
  });

  it('should reject unknown log levels', () => {
    expect(() => loadRunnerConfig({ TXRUN_LOG_LEVEL: 'loud' })).toThrow(InvalidStateError);
  });
});

describe('process defaults', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    vi.resetModules();
  });

  it('should build the default logger at the configured level', async () => {
    vi.stubEnv('TXRUN_LOG_LEVEL', 'Warn');
    const { getDefaultConfig, getDefaultLogger } = await import('../defaults.js');

    expect(getDefaultConfig().logLevel).toBe('warn');
    expect(getDefaultLogger().level).toBe('warn');
  });

  it('should reject an unknown level for the default logger too', async () => {
    vi.stubEnv('TXRUN_LOG_LEVEL', 'loud');
    const { getDefaultLogger } = await import('../defaults.js');

    expect(() => getDefaultLogger()).toThrow('Invalid TXRUN_* environment');
  });
});
