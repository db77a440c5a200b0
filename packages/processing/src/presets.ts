/**
 * Format Presets
 * 
 * The fixed set of target formats a profile can name. Each preset carries
 * the FFmpeg encoding options; the alternative engines map the same keys
 * onto their own flags (see engines/).
 */

import type { ConversionProfile, FormatKey } from '@vconvert/core';
import { normalizeExtension } from '@vconvert/utils';
import type { VideoCodecOptions, AudioCodecOptions } from './commandBuilder.js';

export type PresetKey = Exclude<FormatKey, 'custom'>;

export interface FormatPreset {
  key: PresetKey;
  name: string;
  description: string;
  category: 'intermediate' | 'consumer' | 'legacy';
  
  video: VideoCodecOptions;
  audio: AudioCodecOptions;
  outputArgs?: string[];
  
  container: 'mov' | 'mp4' | 'avi';
  extension: string;
}

export const DEFAULT_CUSTOM_EXTENSION = '.mkv';

const PCM_AUDIO: AudioCodecOptions = { codec: 'pcm_s16le' };
const AAC_AUDIO: AudioCodecOptions = { codec: 'aac', bitrate: '192k' };

export const FORMAT_PRESETS: Record<PresetKey, FormatPreset> = {
  prores: {
    key: 'prores',
    name: 'ProRes 422 HQ',
    description: 'Professional intermediate for editing. Large files, fast to scrub.',
    category: 'intermediate',
    video: {
      codec: 'prores_ks',
      profile: '3', // 422 HQ
      pixFmt: 'yuv422p10le',
    },
    audio: PCM_AUDIO,
    container: 'mov',
    extension: '.mov',
  },

  dnxhr: {
    key: 'dnxhr',
    name: 'DNxHR HQ',
    description: 'Professional intermediate, resolution independent.',
    category: 'intermediate',
    video: {
      codec: 'dnxhd',
      profile: 'dnxhr_hq',
      pixFmt: 'yuv422p',
    },
    audio: PCM_AUDIO,
    container: 'mov',
    extension: '.mov',
  },

  mjpeg: {
    key: 'mjpeg',
    name: 'Motion JPEG',
    description: 'Intra-frame MJPEG with PCM audio. Opens in editors without H.264 decoding.',
    category: 'legacy',
    video: {
      codec: 'mjpeg',
      qscale: 3,
      pixFmt: 'yuvj422p',
    },
    audio: PCM_AUDIO,
    container: 'avi',
    extension: '.avi',
  },

  h264: {
    key: 'h264',
    name: 'H.264',
    description: 'Universal playback with good compression.',
    category: 'consumer',
    video: {
      codec: 'libx264',
      preset: 'medium',
      crf: 18,
      profile: 'high',
      pixFmt: 'yuv420p',
    },
    audio: AAC_AUDIO,
    outputArgs: ['-movflags', '+faststart'],
    container: 'mp4',
    extension: '.mp4',
  },

  h265: {
    key: 'h265',
    name: 'H.265 / HEVC',
    description: 'Half the size of H.264 at similar quality. Slower to encode.',
    category: 'consumer',
    video: {
      codec: 'libx265',
      preset: 'medium',
      crf: 22,
      pixFmt: 'yuv420p',
      tag: 'hvc1',
    },
    audio: AAC_AUDIO,
    outputArgs: ['-movflags', '+faststart'],
    container: 'mp4',
    extension: '.mp4',
  },

  xvid: {
    key: 'xvid',
    name: 'MPEG-4 ASP (Xvid)',
    description: 'Legacy MPEG-4 Part 2 video with MP3 audio.',
    category: 'legacy',
    video: {
      codec: 'mpeg4',
      qscale: 4,
    },
    audio: { codec: 'libmp3lame', bitrate: '192k' },
    container: 'mov',
    extension: '.mov',
  },
};

/**
 * Get a preset by key
 */
export function getPreset(key: FormatKey): FormatPreset | undefined {
  if (key === 'custom') return undefined;
  return FORMAT_PRESETS[key];
}

export function listPresets(): FormatPreset[] {
  return Object.values(FORMAT_PRESETS);
}

/**
 * Output file extension (with dot) for a profile
 */
export function getOutputExtension(profile: ConversionProfile): string {
  const preset = getPreset(profile.formatKey);
  if (preset) return preset.extension;
  return normalizeExtension(profile.customExtension ?? '') || DEFAULT_CUSTOM_EXTENSION;
}
