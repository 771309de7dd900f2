/**
 * Symbolic output slots and their substitution into argument lists
 */

import type { ArgToken, FileInfo, FileKey } from './types.js';

export function fileKey(name: string): FileKey {
  return { kind: 'file-key', name };
}

export function isFileKey(value: unknown): value is FileKey {
  return (
    typeof value === 'object' &&
    value !== null &&
    'kind' in value &&
    value.kind === 'file-key' &&
    'name' in value &&
    typeof value.name === 'string'
  );
}

/**
 * Resolve a key against file info, undefined when the key is not mapped
 */
export function lookupFile(fileInfo: FileInfo, name: string): string | undefined {
  return Object.prototype.hasOwnProperty.call(fileInfo, name) ? fileInfo[name] : undefined;
}

/**
 * Replace keys present in fileInfo with their paths.
 *
 * Literal strings and keys fileInfo does not know are returned as they are.
 */
export function substituteKeys(args: readonly ArgToken[], fileInfo: FileInfo): ArgToken[] {
  return args.map((arg) => {
    if (!isFileKey(arg)) return arg;
    return lookupFile(fileInfo, arg.name) ?? arg;
  });
}
