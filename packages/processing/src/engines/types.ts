/**
 * Engine Adapter Types
 */

import type { ConversionProfile, EngineId, FormatKey } from '@vconvert/core';
import type { ProcessExit, ProcessHandle } from '../process.js';
import type { ProgressParser } from '../progressParser.js';

export type ProgressStyle = 'time' | 'percent';

export interface BuildCommandOptions {
  inputPath: string;
  outputPath: string;
  profile: ConversionProfile;
  overwrite: boolean;  // Only true under the 'overwrite' conflict policy
  threads?: number;    // 0 or absent = engine default
}

export interface ProgressParserOptions {
  durationMs?: number;
}

/**
 * One external transcoding tool
 */
export interface EngineAdapter {
  readonly id: EngineId;
  readonly displayName: string;
  readonly progressStyle: ProgressStyle;

  supports(formatKey: FormatKey): boolean;

  /**
   * Absolute path of the executable
   * @throws EngineUnavailableError
   */
  locate(): Promise<string>;

  /**
   * Argument vector (without the executable) for one conversion
   * @throws PreflightError for unsupported formats or bad custom parameters
   */
  buildCommand(options: BuildCommandOptions): string[];

  start(executable: string, args: string[]): ProcessHandle;

  terminate(handle: ProcessHandle): Promise<ProcessExit>;

  createProgressParser(options?: ProgressParserOptions): ProgressParser;

  /** Only implemented by engines with time-based progress */
  probeDurationMs?(inputPath: string, signal?: AbortSignal): Promise<number | undefined>;
}
