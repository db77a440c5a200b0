/**
 * HandBrakeCLI Engine
 *
 * Consumer formats only. HandBrake prints its status line to stdout,
 * refreshed with carriage returns:
 *   Encoding: task 1 of 1, 45.23 % (87.14 fps, avg 90.00 fps, ETA 00h01m02s)
 */

import type { FormatKey } from '@vconvert/core';
import { parseCustomArgs } from '../customArgs.js';
import { HandBrakeProgressParser, type ProgressParser } from '../progressParser.js';
import { BaseEngineAdapter } from './base.js';
import type { BuildCommandOptions } from './types.js';

const FORMAT_ARGS: Partial<Record<FormatKey, string[]>> = {
  h264: ['--preset', 'Fast 1080p30'],
  h265: ['-e', 'x265', '-q', '22'],
};

export class HandBrakeEngine extends BaseEngineAdapter {
  readonly id = 'handbrake' as const;
  readonly displayName = 'HandBrakeCLI';
  readonly progressStyle = 'percent' as const;

  protected readonly binary = 'handbrake' as const;
  protected readonly formats: readonly FormatKey[] = ['h264', 'h265', 'custom'];

  buildCommand({ inputPath, outputPath, profile, threads }: BuildCommandOptions): string[] {
    this.assertSupported(profile);

    // HandBrake has no "never overwrite" switch; the conflict resolver
    // guarantees the path is free for every other policy
    const args = ['-i', inputPath, '-o', outputPath];

    if (profile.formatKey === 'custom') {
      args.push(...parseCustomArgs(profile.customArgs));
    } else {
      args.push(...(FORMAT_ARGS[profile.formatKey] ?? []));
    }

    if (threads && threads > 0) {
      args.push('--encopts', `threads=${threads}`);
    }

    return args;
  }

  createProgressParser(): ProgressParser {
    return new HandBrakeProgressParser();
  }
}
