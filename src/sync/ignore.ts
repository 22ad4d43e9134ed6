/**
 * Ignore pattern matching for sync operations.
 * Supports .mdsyncignore files and built-in default patterns.
 */
import fs from 'node:fs';
import path from 'node:path';
import { minimatch } from 'minimatch';

export const IGNORE_FILENAME = '.mdsyncignore';

/** Default patterns that are always ignored. */
export const DEFAULT_IGNORE_PATTERNS = [
  '.mdsync.json',
  '.mdsync.lock',
  '.*.tmp.*',
  '~$*',
  '.DS_Store',
  'Thumbs.db',
];

/**
 * Load ignore patterns from a .mdsyncignore file.
 * Returns empty array if file doesn't exist.
 */
export function loadIgnoreFile(localPath: string): string[] {
  const ignoreFile = path.join(localPath, IGNORE_FILENAME);
  if (!fs.existsSync(ignoreFile)) return [];
  return fs.readFileSync(ignoreFile, 'utf-8')
    .split('\n')
    .map(line => line.trim())
    .filter(line => line.length > 0 && !line.startsWith('#'));
}

/**
 * Combine default patterns, config-level patterns, and .mdsyncignore patterns.
 */
export function resolveIgnorePatterns(
  configIgnore: string[],
  localPath: string,
): string[] {
  const filePatterns = loadIgnoreFile(localPath);
  const all = new Set([...DEFAULT_IGNORE_PATTERNS, ...configIgnore, ...filePatterns]);
  return [...all];
}

/**
 * Check if a document name should be ignored.
 */
export function shouldIgnore(name: string, patterns: string[]): boolean {
  return patterns.some(pattern => minimatch(name, pattern, { dot: true }));
}
