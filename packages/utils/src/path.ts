/**
 * Path Utilities
 */

import { extname, basename } from 'node:path';

/**
 * Normalize an extension: lowercase, no leading dot
 */
export function normalizeExtension(ext: string): string {
  return ext.trim().toLowerCase().replace(/^\.+/, '');
}

/**
 * Get base filename without extension
 */
export function getBasename(filename: string): string {
  const ext = extname(filename);
  return basename(filename, ext);
}

/**
 * Build a safe output filename from an optional original name.
 * Keeps letters, digits, space, '-' and '_' from the stem.
 */
export function suggestFilename(
  original: string | undefined,
  defaultStem: string,
  ext: string
): string {
  const stem = original ? getBasename(original) : defaultStem;
  const safeStem = Array.from(stem)
    .filter((char) => /[\p{L}\p{N} _-]/u.test(char))
    .join('')
    .trim();
  return `${safeStem || defaultStem}.${normalizeExtension(ext)}`;
}
