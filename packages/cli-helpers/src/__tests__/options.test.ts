/**
 * Option reporting tests
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { checkMissing, errorMsg, exitWith } from '../options.js';

describe('errorMsg', () => {
  it('should list every error under a heading', () => {
    expect(errorMsg(['first problem', 'second problem'])).toBe(
      'The following errors occurred while parsing your command:\nfirst problem\nsecond problem'
    );
  });
});

describe('checkMissing', () => {
  it('should report required options that are absent', () => {
    expect(checkMissing({ output: 'out.vcf' }, ['output', 'reference', 'sample'])).toEqual([
      'Missing required option: reference',
      'Missing required option: sample',
    ]);
  });

  it('should accept falsy values that were supplied', () => {
    expect(checkMissing({ threads: 0, force: false }, ['threads', 'force'])).toEqual([]);
  });
});

describe('exitWith', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should print errors to stderr and exit with the status', () => {
    const exit = vi.spyOn(process, 'exit').mockImplementation((code) => {
      throw new Error(`exit ${String(code)}`);
    });
    const stderr = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    expect(() => exitWith(2, 'bad options')).toThrow('exit 2');
    expect(stderr).toHaveBeenCalledWith('bad options');
    expect(exit).toHaveBeenCalledWith(2);
  });

  it('should print success messages to stdout', () => {
    vi.spyOn(process, 'exit').mockImplementation((code) => {
      throw new Error(`exit ${String(code)}`);
    });
    const stdout = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    expect(() => exitWith(0, 'done')).toThrow('exit 0');
    expect(stdout).toHaveBeenCalledWith('done');
  });
});
