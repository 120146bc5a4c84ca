/**
 * Path Utilities
 */

import { extname, basename } from 'node:path';

/**
 * Get file extension (without dot, case preserved)
 */
export function getExtension(filename: string): string {
  return extname(filename).replace(/^\./, '');
}

/**
 * Get base filename without extension
 */
export function getBasename(filename: string): string {
  const ext = extname(filename);
  return basename(filename, ext);
}
