/**
 * Time Utilities
 */

/**
 * Format duration in milliseconds to human-readable string
 */
export function formatDuration(ms: number): string {
  if (!Number.isFinite(ms) || ms < 0) {
    return '--';
  }
  if (ms < 1000) {
    return `${Math.round(ms)}ms`;
  }
  
  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);
  const hours = Math.floor(minutes / 60);
  
  if (hours > 0) {
    return `${hours}h ${minutes % 60}m ${seconds % 60}s`;
  }
  if (minutes > 0) {
    return `${minutes}m ${seconds % 60}s`;
  }
  return `${seconds}s`;
}

/**
 * Parse a timecode string (HH:MM:SS or HH:MM:SS.fraction) to milliseconds.
 * Returns null for anything else, including ffmpeg's "N/A".
 */
export function parseTimecode(timecode: string): number | null {
  const match = timecode.trim().match(/^(-?\d+):(\d{1,2}):(\d{1,2}(?:\.\d+)?)$/);
  if (!match) return null;

  const [, rawHours = '0', rawMinutes = '0', rawSeconds = '0'] = match;
  // ffmpeg reports slightly negative times before the first frame
  if (rawHours.startsWith('-')) return 0;

  const hours = parseInt(rawHours, 10);
  const minutes = parseInt(rawMinutes, 10);
  const seconds = parseFloat(rawSeconds);

  return Math.round((hours * 3600 + minutes * 60 + seconds) * 1000);
}

/**
 * Format a date as a local-time stamp with second precision: 20240131_154502
 */
export function formatLocalTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
}
