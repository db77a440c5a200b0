/**
 * Settings
 *
 * Environment-driven configuration, validated with zod.
 * Values come from process.env, optionally seeded from a .env file.
 */

import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';
import { ValidationError } from '../errors/index.js';

const booleanString = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform(value => value === 'true' || value === '1' || value === 'yes');

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('production'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  // Engine executables (empty = search bundled folder, then PATH)
  FFMPEG_PATH: z.string().optional(),
  FFPROBE_PATH: z.string().optional(),
  HANDBRAKE_PATH: z.string().optional(),
  AVIDEMUX_PATH: z.string().optional(),
  VCONVERT_BINARIES_DIR: z.string().optional(),

  // Job settings
  MAX_LOG_LINES: z.coerce.number().int().min(1).default(1000),
  TERMINATE_GRACE_MS: z.coerce.number().int().min(0).default(5000),
  MAX_JOB_DURATION_MS: z.coerce.number().int().positive().optional(),
  ENCODER_THREADS: z.coerce.number().int().min(0).default(0), // 0 = engine default
  ENGINE_FALLBACK: booleanString.default('false'),
  EVENT_CHANNEL_CAPACITY: z.coerce.number().int().min(1).default(256),
});

export interface Settings {
  nodeEnv: 'development' | 'production' | 'test';
  logLevel: string;
  binaries: {
    ffmpeg?: string;
    ffprobe?: string;
    handbrake?: string;
    avidemux?: string;
    bundledDir?: string;
  };
  jobs: {
    maxLogLines: number;
    terminateGraceMs: number;
    maxJobDurationMs?: number;
    encoderThreads: number;
    engineFallback: boolean;
  };
  events: {
    channelCapacity: number;
  };
}

function blankToUndefined(value: string | undefined): string | undefined {
  return value && value.trim().length > 0 ? value.trim() : undefined;
}

/**
 * Parse settings from an environment map
 * Throws ValidationError naming the first offending variable
 */
export function parseSettings(env: NodeJS.ProcessEnv): Settings {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue?.path.join('.') || 'environment';
    throw new ValidationError(field, issue?.message ?? 'invalid value');
  }

  const data = parsed.data;

  return {
    nodeEnv: data.NODE_ENV,
    logLevel: data.LOG_LEVEL,
    binaries: {
      ffmpeg: blankToUndefined(data.FFMPEG_PATH),
      ffprobe: blankToUndefined(data.FFPROBE_PATH),
      handbrake: blankToUndefined(data.HANDBRAKE_PATH),
      avidemux: blankToUndefined(data.AVIDEMUX_PATH),
      bundledDir: blankToUndefined(data.VCONVERT_BINARIES_DIR),
    },
    jobs: {
      maxLogLines: data.MAX_LOG_LINES,
      terminateGraceMs: data.TERMINATE_GRACE_MS,
      maxJobDurationMs: data.MAX_JOB_DURATION_MS,
      encoderThreads: data.ENCODER_THREADS,
      engineFallback: data.ENGINE_FALLBACK,
    },
    events: {
      channelCapacity: data.EVENT_CHANNEL_CAPACITY,
    },
  };
}

/**
 * Load .env (if present) into process.env, then parse
 */
export function loadSettings(envFile?: string): Settings {
  dotenvConfig(envFile ? { path: envFile } : {});
  return parseSettings(process.env);
}
