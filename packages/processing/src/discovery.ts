/**
 * Input Discovery
 *
 * Finds convertible video files in a directory.
 */

import { readdir, stat } from 'node:fs/promises';
import { extname, join, resolve } from 'node:path';
import { PreflightError } from '@vconvert/core';
import { logger } from '@vconvert/utils';

export const VIDEO_EXTENSIONS: readonly string[] = [
  '.mp4', '.avi', '.mov', '.mkv', '.wmv', '.flv', '.webm', '.m4v',
];

export interface DiscoveredFile {
  path: string;
  size: number;
  extension: string;
}

export interface ScanOptions {
  recursive?: boolean;
}

export function isVideoFile(filePath: string): boolean {
  return VIDEO_EXTENSIONS.includes(extname(filePath).toLowerCase());
}

/**
 * List video files under a directory, sorted by path.
 * Hidden files and directories are ignored.
 *
 * @throws PreflightError when the directory cannot be read
 */
export async function scanInputDirectory(dir: string, options: ScanOptions = {}): Promise<DiscoveredFile[]> {
  const root = resolve(dir);

  try {
    const stats = await stat(root);
    if (!stats.isDirectory()) {
      throw new PreflightError(`Not a directory: ${root}`, { dir: root });
    }
  } catch (error) {
    if (error instanceof PreflightError) throw error;
    throw new PreflightError(`Input directory is not readable: ${root}`, { dir: root });
  }

  const files = await walk(root, options.recursive ?? true);
  files.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));

  logger.debug({ dir: root, count: files.length }, 'Scanned input directory');
  return files;
}

async function walk(dir: string, recursive: boolean): Promise<DiscoveredFile[]> {
  const files: DiscoveredFile[] = [];
  const entries = await readdir(dir, { withFileTypes: true });

  for (const entry of entries) {
    if (entry.name.startsWith('.')) continue;
    const fullPath = join(dir, entry.name);

    if (entry.isDirectory()) {
      if (recursive) {
        try {
          files.push(...await walk(fullPath, recursive));
        } catch (error) {
          logger.warn({ err: error, dir: fullPath }, 'Skipping unreadable directory');
        }
      }
    } else if (entry.isFile() && isVideoFile(entry.name)) {
      const stats = await stat(fullPath);
      files.push({
        path: fullPath,
        size: stats.size,
        extension: extname(entry.name).toLowerCase(),
      });
    }
  }

  return files;
}
