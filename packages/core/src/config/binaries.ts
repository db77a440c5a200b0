/**
 * Binary Location
 * 
 * Finds the external engine executables.
 * Supports Windows, Linux and macOS binaries with automatic OS detection.
 * 
 * Priority order:
 * 1. Explicit path (environment variable, e.g. FFMPEG_PATH)
 * 2. Bundled binary folder (packages/core/binaries/<os>/ or VCONVERT_BINARIES_DIR)
 * 3. System PATH
 *
 * Unlike a bare command name left for the OS to resolve, a located binary
 * is known to exist and be executable before any job spawns it.
 */

import { delimiter, dirname, isAbsolute, join, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { isExecutableFile } from '@vconvert/utils';

const __dirname = dirname(fileURLToPath(import.meta.url));

// Binary folder location - relative to packages/core/
const BINARY_ROOT = resolve(__dirname, '../../binaries');

export type BinaryName = 'ffmpeg' | 'ffprobe' | 'handbrake' | 'avidemux';

export interface BinarySpec {
  name: BinaryName;
  envVar: string;
  executables: string[]; // Candidate file names, most preferred first
}

export const BINARY_SPECS: Record<BinaryName, BinarySpec> = {
  ffmpeg: { name: 'ffmpeg', envVar: 'FFMPEG_PATH', executables: ['ffmpeg'] },
  ffprobe: { name: 'ffprobe', envVar: 'FFPROBE_PATH', executables: ['ffprobe'] },
  handbrake: { name: 'handbrake', envVar: 'HANDBRAKE_PATH', executables: ['HandBrakeCLI'] },
  avidemux: {
    name: 'avidemux',
    envVar: 'AVIDEMUX_PATH',
    executables: ['avidemux3_cli', 'avidemux_cli', 'avidemux.appImage'],
  },
};

export interface ResolvedBinary {
  name: BinaryName;
  path: string;
  source: 'env' | 'bundled' | 'path';
}

export interface BinaryLocatorOptions {
  overrides?: Partial<Record<BinaryName, string>>;
  bundledDir?: string;
  searchPath?: string;         // Defaults to process.env.PATH
  platform?: NodeJS.Platform;  // Defaults to process.platform
}

/**
 * OS-specific subfolder
 */
function getOsFolder(platform: NodeJS.Platform): string {
  switch (platform) {
    case 'win32':
      return 'windows';
    case 'darwin':
      return 'macos';
    default:
      return 'linux';
  }
}

export class BinaryLocator {
  private readonly overrides: Partial<Record<BinaryName, string>>;
  private readonly bundledDir: string;
  private readonly searchPath: string;
  private readonly platform: NodeJS.Platform;
  private readonly cache = new Map<BinaryName, Promise<ResolvedBinary | null>>();

  constructor(options: BinaryLocatorOptions = {}) {
    this.overrides = options.overrides ?? {};
    this.platform = options.platform ?? process.platform;
    this.bundledDir = options.bundledDir ?? join(BINARY_ROOT, getOsFolder(this.platform));
    this.searchPath = options.searchPath ?? process.env['PATH'] ?? '';
  }

  /**
   * Every path that locate() would try for a binary, in order
   */
  candidates(name: BinaryName): Array<{ path: string; source: ResolvedBinary['source'] }> {
    const spec = BINARY_SPECS[name];
    const ext = this.platform === 'win32' ? '.exe' : '';
    const result: Array<{ path: string; source: ResolvedBinary['source'] }> = [];

    const override = this.overrides[name];
    if (override) {
      result.push({ path: isAbsolute(override) ? override : resolve(override), source: 'env' });
    }

    for (const exe of spec.executables) {
      result.push({ path: join(this.bundledDir, exe + ext), source: 'bundled' });
    }

    const dirs = this.searchPath.split(delimiter).filter(dir => dir.length > 0);
    for (const dir of dirs) {
      for (const exe of spec.executables) {
        result.push({ path: join(dir, exe + ext), source: 'path' });
      }
    }

    return result;
  }

  /**
   * Resolve a binary; null when no candidate is an executable file
   */
  locate(name: BinaryName): Promise<ResolvedBinary | null> {
    let pending = this.cache.get(name);
    if (!pending) {
      pending = this.search(name);
      this.cache.set(name, pending);
    }
    return pending;
  }

  private async search(name: BinaryName): Promise<ResolvedBinary | null> {
    for (const candidate of this.candidates(name)) {
      if (await isExecutableFile(candidate.path)) {
        return { name, path: candidate.path, source: candidate.source };
      }
    }
    return null;
  }
}

/**
 * Get binary folder paths for user reference
 */
export function getBinaryFolders(platform: NodeJS.Platform = process.platform): { root: string; os: string } {
  return {
    root: BINARY_ROOT,
    os: join(BINARY_ROOT, getOsFolder(platform)),
  };
}
