/**
 * Idempotency checks: skip work whose outputs already exist
 */

import type { PathInput } from './types.js';
import { fileSize, modifiedTime } from './paths.js';

function flattenPaths(inputs: readonly PathInput[]): string[] {
  const out: string[] = [];
  for (const input of inputs) {
    if (typeof input === 'string') {
      out.push(input);
    } else {
      out.push(...flattenPaths(input));
    }
  }
  return out;
}

/**
 * Check whether output files still need to be produced.
 *
 * True unless every path exists with a non-zero size. Empty files count as
 * missing: a process killed before writing anything leaves one behind.
 */
export async function needsRun(...paths: PathInput[]): Promise<boolean> {
  const sizes = await Promise.all(flattenPaths(paths).map((p) => fileSize(p)));
  return sizes.some((size) => size <= 0);
}

/**
 * Check that a derived file is at least as recent as its parent
 */
export async function isUpToDate(derived: string, parent: string): Promise<boolean> {
  const [derivedTime, parentTime] = await Promise.all([modifiedTime(derived), modifiedTime(parent)]);
  return derivedTime >= parentTime;
}
