// Tests for environment settings parsing.
import { describe, expect, it } from 'vitest';
import { parseSettings } from './settings.js';
import { ValidationError } from '../errors/index.js';

describe('parseSettings', () => {
  it('applies defaults to an empty environment', () => {
    const settings = parseSettings({});

    expect(settings.nodeEnv).toBe('production');
    expect(settings.logLevel).toBe('info');
    expect(settings.jobs).toEqual({
      maxLogLines: 1000,
      terminateGraceMs: 5000,
      maxJobDurationMs: undefined,
      encoderThreads: 0,
      engineFallback: false,
    });
    expect(settings.events.channelCapacity).toBe(256);
  });

  it('reads engine paths and numeric limits', () => {
    const settings = parseSettings({
      FFMPEG_PATH: '/opt/ffmpeg/bin/ffmpeg',
      HANDBRAKE_PATH: '  ',
      MAX_JOB_DURATION_MS: '60000',
      ENCODER_THREADS: '4',
      ENGINE_FALLBACK: 'yes',
    });

    expect(settings.binaries.ffmpeg).toBe('/opt/ffmpeg/bin/ffmpeg');
    expect(settings.binaries.handbrake).toBeUndefined();
    expect(settings.jobs.maxJobDurationMs).toBe(60000);
    expect(settings.jobs.encoderThreads).toBe(4);
    expect(settings.jobs.engineFallback).toBe(true);
  });

  it('names the offending variable', () => {
    expect(() => parseSettings({ MAX_LOG_LINES: 'lots' })).toThrow(ValidationError);
    expect(() => parseSettings({ MAX_LOG_LINES: 'lots' })).toThrow(/MAX_LOG_LINES/);
  });
});
