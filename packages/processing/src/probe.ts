/**
 * Duration Probe
 *
 * Asks ffprobe for the container duration so time-based progress can be
 * turned into a percentage before the encode starts.
 */

import { executeCommand, logger } from '@vconvert/utils';

const PROBE_TIMEOUT_MS = 10000;

/**
 * Duration of a media file in milliseconds, or undefined when ffprobe
 * fails or reports nothing usable
 */
export async function probeDuration(
  ffprobePath: string,
  inputPath: string,
  signal?: AbortSignal
): Promise<number | undefined> {
  try {
    const result = await executeCommand(ffprobePath, [
      '-v', 'quiet',
      '-show_entries', 'format=duration',
      '-of', 'csv=p=0',
      inputPath,
    ], { timeout: PROBE_TIMEOUT_MS, signal });

    if (result.exitCode !== 0 || result.timedOut) {
      logger.debug({ inputPath, exitCode: result.exitCode, timedOut: result.timedOut }, 'ffprobe failed');
      return undefined;
    }

    return parseProbeDuration(result.stdout);
  } catch (error) {
    logger.debug({ err: error, inputPath }, 'ffprobe could not be started');
    return undefined;
  }
}

/**
 * Parse ffprobe's `csv=p=0` duration output (seconds, e.g. "12.345000")
 */
export function parseProbeDuration(output: string): number | undefined {
  const seconds = Number.parseFloat(output.trim());
  if (!Number.isFinite(seconds) || seconds <= 0) return undefined;
  return Math.round(seconds * 1000);
}
