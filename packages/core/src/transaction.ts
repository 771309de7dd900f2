/**
 * Transactional staging of output files
 *
 * Outputs are written into a private directory next to their final location
 * and moved into place by rename only after the work succeeded. The staging
 * directory is removed on every exit path.
 */

import { randomBytes } from 'crypto';
import * as fs from 'fs/promises';
import * as path from 'path';
import type { FileInfo, StagedFiles, TransactionOptions } from './types.js';
import { DEFAULT_TX_PREFIX } from './config.js';
import { InvalidStateError, IOError, errorCodeOf, toIOError } from './errors.js';
import { lookupFile } from './fileInfo.js';
import { exists, isDirectory } from './paths.js';
import { getDefaultLogger } from './defaults.js';

/** Key used when a single path is staged on its own */
const SINGLE_OUTPUT_KEY = 'out';

/**
 * Create a uniquely named directory under rootDir.
 *
 * rootDir is created first when missing; mkdtemp guarantees the name is not
 * shared with a concurrent transaction.
 */
export async function createTempDir(rootDir: string, prefix: string): Promise<string> {
  try {
    await fs.mkdir(rootDir, { recursive: true });
    return await fs.mkdtemp(path.join(rootDir, prefix));
  } catch (err) {
    throw toIOError(err, `Failed to create temporary directory in ${rootDir}`);
  }
}

/**
 * Remove a transaction directory or set-aside file, logging instead of
 * throwing so an error from the work itself is never replaced
 */
async function discardPath(target: string, options: TransactionOptions): Promise<void> {
  try {
    await fs.rm(target, { recursive: true, force: true });
  } catch (err) {
    const logger = options.logger ?? getDefaultLogger();
    logger.warn({ err, path: target }, 'Failed to remove transaction path');
  }
}

/**
 * Point transactional keys of fileInfo into a fresh transaction directory.
 *
 * The directory is created in the parent directory of the first key's path;
 * each staged file keeps its original base name.
 */
export async function stageFiles(
  fileInfo: FileInfo,
  keys: readonly string[],
  options: TransactionOptions = {}
): Promise<StagedFiles> {
  const [firstKey] = keys;
  if (firstKey === undefined) {
    throw new InvalidStateError('Cannot stage an empty set of output keys');
  }

  const finalPaths = keys.map((key) => {
    const finalPath = lookupFile(fileInfo, key);
    if (finalPath === undefined) {
      throw new InvalidStateError(`Output key "${key}" is not present in file info`);
    }
    if (!finalPath.trim() || finalPath.includes('\0')) {
      throw new InvalidStateError(`Output key "${key}" maps to an unusable path "${finalPath}"`);
    }
    return finalPath;
  });

  const baseNames = new Set(finalPaths.map((p) => path.basename(p)));
  if (baseNames.size !== finalPaths.length) {
    throw new InvalidStateError(`Output files of one transaction must have distinct base names: ${finalPaths.join(', ')}`);
  }

  const firstPath = finalPaths[0] ?? '';
  if (path.basename(firstPath) === '') {
    throw new InvalidStateError(`Cannot resolve a parent directory for output key "${firstKey}"`);
  }

  const txDir = await createTempDir(path.dirname(firstPath), options.prefix ?? DEFAULT_TX_PREFIX);

  const staged: Record<string, string> = { ...fileInfo };
  keys.forEach((key, i) => {
    const finalPath = finalPaths[i];
    if (finalPath !== undefined) {
      staged[key] = path.join(txDir, path.basename(finalPath));
    }
  });

  return { staged, txDir };
}

/**
 * Copy across filesystems: write to a sibling of the destination, then rename
 * it into place so the destination is never seen half-written
 */
async function copyThenRename(source: string, destination: string): Promise<void> {
  const tmp = `${destination}.tmp.${randomBytes(4).toString('hex')}`;
  try {
    await fs.cp(source, tmp, { recursive: true, errorOnExist: true, force: false });
    await fs.rename(tmp, destination);
  } catch (err) {
    await fs.rm(tmp, { recursive: true, force: true });
    throw err;
  }
  await fs.rm(source, { recursive: true, force: true });
}

/**
 * Move a file or directory, falling back to copy and rename when source and
 * destination live on different devices
 */
export async function movePath(source: string, destination: string): Promise<void> {
  try {
    await fs.mkdir(path.dirname(destination), { recursive: true });
    await fs.rename(source, destination);
  } catch (err) {
    if (errorCodeOf(err) === 'EXDEV') {
      try {
        await copyThenRename(source, destination);
        return;
      } catch (copyErr) {
        throw toIOError(copyErr, `Failed to move ${source} to ${destination} across devices`);
      }
    }
    throw toIOError(err, `Failed to move ${source} to ${destination}`);
  }
}

interface Promotion {
  source: string;
  destination: string;
  /** Earlier file at destination, set aside until the whole set is in place */
  backup?: string;
}

/**
 * Rename an existing regular file at destination out of the way. Directories
 * are left where they are, so promoting onto one still fails.
 */
async function setAside(destination: string): Promise<string | undefined> {
  if (!(await exists(destination)) || (await isDirectory(destination))) {
    return undefined;
  }
  const backup = `${destination}.txbak.${randomBytes(4).toString('hex')}`;
  await movePath(destination, backup);
  return backup;
}

async function promoteOne(source: string, destination: string): Promise<Promotion> {
  const backup = await setAside(destination);
  try {
    await movePath(source, destination);
  } catch (err) {
    if (backup !== undefined) {
      await movePath(backup, destination);
    }
    throw err;
  }
  return { source, destination, backup };
}

/**
 * Undo completed promotions, newest first: outputs go back to their staged
 * paths and earlier files are restored
 */
async function rollBack(done: readonly Promotion[], options: TransactionOptions): Promise<void> {
  for (const { source, destination, backup } of [...done].reverse()) {
    try {
      await movePath(destination, source);
      if (backup !== undefined) {
        await movePath(backup, destination);
      }
    } catch (err) {
      const logger = options.logger ?? getDefaultLogger();
      logger.warn({ err, destination }, 'Failed to roll back promoted output');
    }
  }
}

/**
 * Move staged outputs and their sidecar files to their final paths.
 *
 * Either every output is moved or, when a move fails, the ones already moved
 * are put back and any files they replaced are restored.
 */
export async function promoteFiles(
  staged: FileInfo,
  fileInfo: FileInfo,
  keys: readonly string[],
  options: TransactionOptions = {}
): Promise<void> {
  const outputs = keys.map((key) => {
    const stagedPath = lookupFile(staged, key);
    const finalPath = lookupFile(fileInfo, key);
    if (stagedPath === undefined || finalPath === undefined) {
      throw new InvalidStateError(`Output key "${key}" is missing from staged or final file info`);
    }
    return { key, stagedPath, finalPath };
  });

  const moves: Array<Pick<Promotion, 'source' | 'destination'>> = [];
  for (const { key, stagedPath, finalPath } of outputs) {
    if (!(await exists(stagedPath))) {
      throw new IOError(`Command did not produce output "${key}" at ${stagedPath}`);
    }
    moves.push({ source: stagedPath, destination: finalPath });
    for (const ext of options.sideExtensions ?? []) {
      if (await exists(stagedPath + ext)) {
        moves.push({ source: stagedPath + ext, destination: finalPath + ext });
      }
    }
  }

  const done: Promotion[] = [];
  try {
    for (const { source, destination } of moves) {
      done.push(await promoteOne(source, destination));
    }
  } catch (err) {
    await rollBack(done, options);
    throw err;
  }

  for (const { backup } of done) {
    if (backup !== undefined) {
      await discardPath(backup, options);
    }
  }
}

/**
 * Run work with a temporary directory under rootDir, removed afterwards
 */
export async function withTempDir<T>(
  rootDir: string,
  work: (tmpDir: string) => Promise<T>,
  options: Pick<TransactionOptions, 'logger'> = {}
): Promise<T> {
  const tmpDir = await createTempDir(rootDir, 'tmp');
  try {
    return await work(tmpDir);
  } finally {
    await discardPath(tmpDir, options);
  }
}

/**
 * Run work against staged copies of the given output keys, promoting them
 * together once work resolves.
 *
 * With no keys, work receives fileInfo unchanged and nothing is staged.
 */
export async function withTxFiles<T>(
  fileInfo: FileInfo,
  keys: readonly string[],
  work: (staged: FileInfo) => Promise<T>,
  options: TransactionOptions = {}
): Promise<T> {
  if (keys.length === 0) {
    return work(fileInfo);
  }

  const { staged, txDir } = await stageFiles(fileInfo, keys, options);
  try {
    const result = await work(staged);
    await promoteFiles(staged, fileInfo, keys, options);
    return result;
  } finally {
    await discardPath(txDir, options);
  }
}

/**
 * Single-output transaction: work writes to stagedPath, which becomes
 * filePath once work resolves
 */
export async function withTxFile<T>(
  filePath: string,
  work: (stagedPath: string, txDir: string) => Promise<T>,
  options: TransactionOptions = {}
): Promise<T> {
  const fileInfo: FileInfo = { [SINGLE_OUTPUT_KEY]: filePath };
  const { staged, txDir } = await stageFiles(fileInfo, [SINGLE_OUTPUT_KEY], options);
  try {
    const stagedPath = lookupFile(staged, SINGLE_OUTPUT_KEY);
    if (stagedPath === undefined) {
      throw new InvalidStateError(`No staged path was allocated for ${filePath}`);
    }
    const result = await work(stagedPath, txDir);
    await promoteFiles(staged, fileInfo, [SINGLE_OUTPUT_KEY], options);
    return result;
  } finally {
    await discardPath(txDir, options);
  }
}
