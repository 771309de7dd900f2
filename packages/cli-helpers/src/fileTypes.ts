/**
 * Classify pipeline inputs as BAM/CRAM, VCF, or list files of further inputs
 */

import { createReadStream } from 'fs';
import * as fs from 'fs/promises';
import { createInterface } from 'readline';
import type { Readable } from 'stream';
import { createGunzip } from 'zlib';
import { exists, isDirectory, IOError } from '@txrun/core';

export type InputFileType = 'bam' | 'vcf' | 'list';

export type CollectedInputs = Partial<Record<Exclude<InputFileType, 'list'> | 'missing', string[]>>;

const VCF_HEADER = '##fileformat=VCF';
const GZIP_MAGIC = [0x1f, 0x8b];
const ALIGNMENT_EXTENSIONS = ['.bam', '.cram'];

async function isFile(filePath: string): Promise<boolean> {
  return (await exists(filePath)) && !(await isDirectory(filePath));
}

/**
 * True when filePath or its .gz sibling is a regular file
 */
export async function existsOrGz(filePath: string): Promise<boolean> {
  return (await isFile(filePath)) || (await isFile(`${filePath}.gz`));
}

async function isGzipped(filePath: string): Promise<boolean> {
  const handle = await fs.open(filePath, 'r');
  try {
    const { buffer, bytesRead } = await handle.read(Buffer.alloc(2), 0, 2, 0);
    return bytesRead === 2 && buffer[0] === GZIP_MAGIC[0] && buffer[1] === GZIP_MAGIC[1];
  } finally {
    await handle.close();
  }
}

/**
 * First line of a plain or gzip-compressed text file, '' when empty
 */
export async function readFirstLine(filePath: string): Promise<string> {
  const source: Readable = (await isGzipped(filePath))
    ? createReadStream(filePath).pipe(createGunzip())
    : createReadStream(filePath);
  const lines = createInterface({ input: source, crlfDelay: Infinity });
  try {
    for await (const line of lines) {
      return line;
    }
    return '';
  } finally {
    lines.close();
    source.destroy();
  }
}

/**
 * Classify an existing input. A missing file falls back to its .gz sibling.
 */
export async function detectFileType(filePath: string): Promise<InputFileType> {
  if (ALIGNMENT_EXTENSIONS.some((ext) => filePath.endsWith(ext))) {
    return 'bam';
  }
  const readable = (await isFile(filePath)) ? filePath : `${filePath}.gz`;
  let firstLine: string;
  try {
    firstLine = await readFirstLine(readable);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new IOError(`Failed to read ${readable}: ${detail}`, { cause: err });
  }
  return firstLine.startsWith(VCF_HEADER) ? 'vcf' : 'list';
}

async function readListFile(filePath: string): Promise<string[]> {
  const content = await fs.readFile(filePath, 'utf-8');
  return content
    .split(/\r?\n/)
    .map((line) => line.trimEnd())
    .filter((line) => line.length > 0);
}

async function expandInput(
  filePath: string,
  visited: Set<string>
): Promise<Array<[Exclude<InputFileType, 'list'> | 'missing', string]>> {
  if (!(await existsOrGz(filePath))) {
    return [['missing', filePath]];
  }
  const fileType = await detectFileType(filePath);
  if (fileType !== 'list') {
    return [[fileType, filePath]];
  }
  if (visited.has(filePath)) {
    return [];
  }
  visited.add(filePath);

  const expanded: Array<[Exclude<InputFileType, 'list'> | 'missing', string]> = [];
  for (const entry of await readListFile(filePath)) {
    expanded.push(...(await expandInput(entry, visited)));
  }
  return expanded;
}

/**
 * Gather VCF and BAM/CRAM inputs from paths given on a command line.
 *
 * Files that are neither are read as lists of further inputs, one per line.
 * Paths that do not exist are reported under `missing`.
 */
export async function collectVcfBamArgs(paths: readonly string[]): Promise<CollectedInputs> {
  const collected: CollectedInputs = {};
  const visited = new Set<string>();
  for (const filePath of paths) {
    for (const [fileType, found] of await expandInput(filePath, visited)) {
      (collected[fileType] ??= []).push(found);
    }
  }
  return collected;
}
