import { describe, expect, it } from 'vitest';
import { parseProbeDuration, probeDuration } from './probe.js';

describe('parseProbeDuration', () => {
  it('converts seconds to milliseconds', () => {
    expect(parseProbeDuration('12.345000\n')).toBe(12345);
    expect(parseProbeDuration('3600')).toBe(3600000);
  });

  it('returns undefined for unusable output', () => {
    expect(parseProbeDuration('N/A')).toBeUndefined();
    expect(parseProbeDuration('')).toBeUndefined();
    expect(parseProbeDuration('0.000000')).toBeUndefined();
  });
});

describe('probeDuration', () => {
  it('returns undefined when ffprobe cannot be started', async () => {
    expect(await probeDuration('/nonexistent/vconvert-ffprobe', '/videos/clip.avi')).toBeUndefined();
  });
});
