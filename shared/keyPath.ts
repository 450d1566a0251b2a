import path from 'path';
import { ValidationError } from './errors';

const decoder = new TextDecoder('utf-8', { fatal: true });
const encoder = new TextEncoder();

/**
 * Turns a filesystem path into a document key: `root` is stripped, `prefix`
 * prepended, and a trailing null byte appended.
 */
export function pathToKey(filePath: string, prefix?: string, root?: string): Uint8Array {
  let relative = filePath;
  if (root !== undefined) {
    const rel = path.relative(root, filePath);
    if (!rel.startsWith('..') && !path.isAbsolute(rel)) relative = rel;
  }
  const keyStr = (prefix ?? '') + relative;
  const bytes = encoder.encode(keyStr);
  const key = new Uint8Array(bytes.length + 1);
  key.set(bytes, 0);
  return key;
}

/** Inverse of {@link pathToKey}. */
export function keyToPath(key: Uint8Array, prefix?: string, root?: string): string {
  const trimmed = key.length > 0 && key[key.length - 1] === 0 ? key.subarray(0, key.length - 1) : key;

  let keyStr: string;
  try {
    keyStr = decoder.decode(trimmed);
  } catch {
    throw new ValidationError('invalid UTF-8 in key', 'INVALID_KEY');
  }

  const pathStr = prefix !== undefined && keyStr.startsWith(prefix) ? keyStr.slice(prefix.length) : keyStr;
  if (root === undefined) return pathStr;
  return path.join(root, pathStr.replace(/^\/+/, ''));
}
