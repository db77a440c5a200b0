/**
 * Avidemux CLI Engine
 *
 * Drives avidemux3_cli (or the AppImage) in batch mode:
 *   --nogui --load <in> --video-codec <v> --audio-codec <a> --output-format <f> --save <out> --quit
 */

import type { FormatKey } from '@vconvert/core';
import { parseCustomArgs } from '../customArgs.js';
import { PercentProgressParser, type ProgressParser } from '../progressParser.js';
import { BaseEngineAdapter } from './base.js';
import type { BuildCommandOptions } from './types.js';

interface AvidemuxTarget {
  videoCodec: string;
  audioCodec: string;
  outputFormat: string;
}

const TARGETS: Partial<Record<FormatKey, AvidemuxTarget>> = {
  xvid: { videoCodec: 'xvid4', audioCodec: 'Lame', outputFormat: 'MOV' },
  mjpeg: { videoCodec: 'Mjpeg', audioCodec: 'PCM', outputFormat: 'AVI' },
  h264: { videoCodec: 'x264', audioCodec: 'LavAAC', outputFormat: 'MP4' },
  h265: { videoCodec: 'x265', audioCodec: 'LavAAC', outputFormat: 'MP4' },
};

// e.g. "Saving ... 42%" / "Done: 42 %"
const PROGRESS_PATTERN = /(\d{1,3}(?:\.\d+)?)\s*%/;

export class AvidemuxEngine extends BaseEngineAdapter {
  readonly id = 'avidemux' as const;
  readonly displayName = 'Avidemux';
  readonly progressStyle = 'percent' as const;

  protected readonly binary = 'avidemux' as const;
  protected readonly formats: readonly FormatKey[] = ['xvid', 'mjpeg', 'h264', 'h265', 'custom'];

  buildCommand({ inputPath, outputPath, profile }: BuildCommandOptions): string[] {
    this.assertSupported(profile);

    const args = ['--nogui', '--load', inputPath];

    const target = TARGETS[profile.formatKey];
    if (target) {
      args.push(
        '--video-codec', target.videoCodec,
        '--audio-codec', target.audioCodec,
        '--output-format', target.outputFormat
      );
    } else {
      args.push(...parseCustomArgs(profile.customArgs));
    }

    args.push('--save', outputPath, '--quit');
    return args;
  }

  createProgressParser(): ProgressParser {
    return new PercentProgressParser(PROGRESS_PATTERN);
  }
}
