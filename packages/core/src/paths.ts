/**
 * Path naming and filesystem query helpers
 */

import * as fs from 'fs/promises';
import type { Stats } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { errorCodeOf, toIOError } from './errors.js';

/** Compression suffixes stripped by removeZipExt, longest first */
const ZIP_EXTENSIONS = ['.tar.gz', '.tar.bz2', '.gz', '.bz2', '.zip'];

export function parentDirectory(filePath: string): string {
  return path.dirname(filePath);
}

export function baseName(filePath: string): string {
  return path.basename(filePath);
}

/**
 * stat that resolves null for paths that do not exist
 */
async function statOrNull(filePath: string): Promise<Stats | null> {
  try {
    return await fs.stat(filePath);
  } catch (err) {
    const code = errorCodeOf(err);
    if (code === 'ENOENT' || code === 'ENOTDIR') {
      return null;
    }
    throw toIOError(err, `Failed to stat ${filePath}`);
  }
}

export async function exists(filePath: string): Promise<boolean> {
  return (await statOrNull(filePath)) !== null;
}

export async function isDirectory(filePath: string): Promise<boolean> {
  const stats = await statOrNull(filePath);
  return stats?.isDirectory() ?? false;
}

/**
 * Size in bytes, 0 for paths that do not exist
 */
export async function fileSize(filePath: string): Promise<number> {
  const stats = await statOrNull(filePath);
  return stats?.size ?? 0;
}

/**
 * Last modification time in milliseconds since the epoch
 */
export async function modifiedTime(filePath: string): Promise<number> {
  try {
    const stats = await fs.stat(filePath);
    return stats.mtimeMs;
  } catch (err) {
    throw toIOError(err, `Failed to read modification time of ${filePath}`);
  }
}

/**
 * File name without its last extension: /path/to/fname.txt -> /path/to/fname
 */
export function fileRoot(fname: string): string {
  const ext = path.extname(fname);
  return ext ? fname.slice(0, -ext.length) : fname;
}

/**
 * Add a part before the extension: base.txt -> base-part.txt
 *
 * With outDir, the new name is placed in that directory instead.
 */
export function addFilePart(fname: string, part: string, outDir?: string): string {
  const outFname = `${fileRoot(fname)}-${part}${path.extname(fname)}`;
  return outDir === undefined ? outFname : path.join(outDir, path.basename(outFname));
}

/**
 * Remove a part added by addFilePart: base-part.txt -> base.txt
 */
export function removeFilePart(fname: string, part: string): string {
  return fname.split(`-${part}`).join('');
}

/**
 * Strip compression extensions: test.tar.gz -> test, test.txt.gz -> test.txt
 */
export function removeZipExt(fname: string): string {
  return ZIP_EXTENSIONS.reduce(
    (current, ext) => (current.endsWith(ext) ? current.slice(0, -ext.length) : current),
    fname
  );
}

/**
 * Absolute, normalized path with a leading ~ expanded
 */
export function absPath(fname: string): string {
  const expanded =
    fname === '~' || fname.startsWith('~/') ? path.join(os.homedir(), fname.slice(1)) : fname;
  return path.resolve(expanded);
}

/**
 * Remove a file or directory tree if it exists
 */
export async function removePath(target: string): Promise<void> {
  try {
    await fs.rm(target, { recursive: true, force: true });
  } catch (err) {
    throw toIOError(err, `Failed to remove ${target}`);
  }
}
