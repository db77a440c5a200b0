/**
 * FFmpeg Engine
 *
 * Primary engine. Supports every format key; progress is read from the
 * `-progress pipe:1` block on stdout and related to the probed duration.
 */

import { FORMAT_KEYS, type FormatKey } from '@vconvert/core';
import { FFmpegCommandBuilder } from '../commandBuilder.js';
import { parseCustomArgs } from '../customArgs.js';
import { FORMAT_PRESETS } from '../presets.js';
import { probeDuration } from '../probe.js';
import { TimeProgressParser, type ProgressParser } from '../progressParser.js';
import { BaseEngineAdapter } from './base.js';
import type { BuildCommandOptions, ProgressParserOptions } from './types.js';

export class FFmpegEngine extends BaseEngineAdapter {
  readonly id = 'ffmpeg' as const;
  readonly displayName = 'FFmpeg';
  readonly progressStyle = 'time' as const;

  protected readonly binary = 'ffmpeg' as const;
  protected readonly formats: readonly FormatKey[] = FORMAT_KEYS;

  buildCommand({ inputPath, outputPath, profile, overwrite, threads }: BuildCommandOptions): string[] {
    this.assertSupported(profile);

    const builder = new FFmpegCommandBuilder()
      .addGlobalArg('-hide_banner', '-nostdin')
      .addGlobalArg('-progress', 'pipe:1', '-nostats')
      .addGlobalArg(overwrite ? '-y' : '-n');

    if (threads && threads > 0) {
      builder.addGlobalArg('-threads', threads.toString());
    }

    builder.addInput(inputPath);

    if (profile.formatKey === 'custom') {
      builder.addOutputArgs(...parseCustomArgs(profile.customArgs));
    } else {
      const preset = FORMAT_PRESETS[profile.formatKey];
      builder
        .mapVideo(0, 0)
        .mapAudio(0)
        .setVideoCodec(preset.video)
        .setAudioCodec(preset.audio)
        .copyMetadata(0);

      if (preset.outputArgs) {
        builder.addOutputArgs(...preset.outputArgs);
      }
    }

    return builder.setOutput(outputPath).build();
  }

  createProgressParser(options: ProgressParserOptions = {}): ProgressParser {
    return new TimeProgressParser(options.durationMs);
  }

  async probeDurationMs(inputPath: string, signal?: AbortSignal): Promise<number | undefined> {
    const ffprobe = await this.locator.locate('ffprobe');
    if (!ffprobe) return undefined;
    return probeDuration(ffprobe.path, inputPath, signal);
  }
}
