/**
 * Path Utilities
 */

import { extname, basename, dirname, join } from 'node:path';

/**
 * Get file extension (lowercase, without dot)
 */
export function getExtension(filename: string): string {
  const ext = extname(filename);
  return ext.toLowerCase().replace(/^\./, '');
}

/**
 * Get base filename without extension
 */
export function getBasename(filename: string): string {
  const ext = extname(filename);
  return basename(filename, ext);
}

/**
 * Insert a tag between a file's name and its extension:
 * /out/clip.mp4 + "1" -> /out/clip_1.mp4
 */
export function withNameSuffix(filePath: string, suffix: string): string {
  const ext = extname(filePath);
  return join(dirname(filePath), `${basename(filePath, ext)}_${suffix}${ext}`);
}

/**
 * Normalize an extension to the ".ext" form
 */
export function normalizeExtension(ext: string): string {
  const trimmed = ext.trim().toLowerCase();
  if (!trimmed) return '';
  return trimmed.startsWith('.') ? trimmed : `.${trimmed}`;
}
