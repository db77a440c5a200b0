// Tests for timecode parsing and timestamp formatting.
import { describe, expect, it } from 'vitest';
import { formatDuration, formatLocalTimestamp, parseTimecode } from './time.js';

describe('parseTimecode', () => {
  it('parses hours, minutes and fractional seconds', () => {
    expect(parseTimecode('00:01:30.50')).toBe(90500);
    expect(parseTimecode('01:00:00')).toBe(3600000);
  });

  it('clamps negative times to zero', () => {
    expect(parseTimecode('-00:00:00.023')).toBe(0);
  });

  it('rejects anything that is not a timecode', () => {
    expect(parseTimecode('N/A')).toBeNull();
    expect(parseTimecode('12.5')).toBeNull();
  });
});

describe('formatLocalTimestamp', () => {
  it('formats local date and time to the second', () => {
    expect(formatLocalTimestamp(new Date(2024, 0, 31, 15, 45, 2))).toBe('20240131_154502');
  });
});

describe('formatDuration', () => {
  it('picks the largest useful unit', () => {
    expect(formatDuration(450)).toBe('450ms');
    expect(formatDuration(65000)).toBe('1m 5s');
    expect(formatDuration(3723000)).toBe('1h 2m 3s');
  });
});
