/**
 * CLI Configuration
 *
 * Engine paths and job limits come from the environment (and .env);
 * conversion choices come from command-line flags.
 */

import { z } from 'zod';
import {
  CONFLICT_POLICIES,
  ENGINE_IDS,
  FORMAT_KEYS,
  loadSettings,
  type Settings,
} from '@vconvert/core';
import { setLogLevel } from '@vconvert/utils';

let cached: Settings | null = null;

/**
 * Load settings once. The CLI keeps the loggers at warn unless LOG_LEVEL
 * is set (in the environment or .env) or --debug is passed.
 */
export function getSettings(debug: boolean = false): Settings {
  if (!cached) {
    cached = loadSettings();
    // .env has been merged into process.env by now
    setLogLevel(process.env['LOG_LEVEL'] ? cached.logLevel : 'warn');
  }
  if (debug) {
    setLogLevel('debug');
  }
  return cached;
}

// Flags of the convert command
export const convertOptionsSchema = z.object({
  engine: z.enum(ENGINE_IDS).default('ffmpeg'),
  format: z.enum(FORMAT_KEYS).default('mjpeg'),
  conflict: z.enum(CONFLICT_POLICIES).default('overwrite'),
  customArgs: z.string().optional(),
  extension: z.string().optional(),
  recursive: z.boolean().default(true),
  fallback: z.boolean().optional(),
  verbose: z.boolean().default(false),
  json: z.boolean().default(false),
  debug: z.boolean().default(false),
});

export type ConvertOptions = z.infer<typeof convertOptionsSchema>;
