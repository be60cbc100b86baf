import path from 'node:path';
import os from 'node:os';

/**
 * Normalizes a path to use forward slashes, which is the form packbench writes to the ledger.
 *
 * @param p The path to normalize.
 * @returns The normalized path with forward slashes.
 */
export function normalizePath(p: string): string {
  return p.replace(/\\/g, '/');
}

/**
 * A platform-agnostic version of `path.relative`.
 */
export function relative(from: string, to: string): string {
  return normalizePath(path.relative(from, to));
}

/**
 * Derives a case identifier from a case file path: the file name without its last extension.
 *
 * @example caseIdFromPath('cases/c01.txt') === 'c01'
 */
export function caseIdFromPath(p: string): string {
  const base = path.basename(p);
  const ext = path.extname(base);
  return ext && ext !== base ? base.slice(0, -ext.length) : base;
}

/**
 * Checks if the current environment is Windows.
 */
export function isWindows(): boolean {
  return os.platform() === 'win32';
}
