/**
 * FFmpeg Command Builder
 * 
 * Fluent API for building FFmpeg transcode argument vectors.
 * The result is passed to spawn() directly, never through a shell.
 */

export interface StreamMapping {
  inputIndex: number;
  streamSpec: string;     // e.g., 'v:0', 'a:1'
  optional?: boolean;     // Add ? for optional
}

export interface VideoCodecOptions {
  codec: 'prores_ks' | 'dnxhd' | 'mjpeg' | 'libx264' | 'libx265' | 'libxvid' | 'mpeg4';
  preset?: string;
  crf?: number;
  qscale?: number;        // -q:v, for intra-frame codecs
  profile?: string;
  pixFmt?: string;
  tag?: string;           // -tag:v, e.g. hvc1 for Apple players
}

export interface AudioCodecOptions {
  codec: 'aac' | 'libmp3lame' | 'pcm_s16le' | 'pcm_s24le';
  bitrate?: string;
}

export class FFmpegCommandBuilder {
  private globalArgs: string[] = [];
  private inputs: string[] = [];
  private mappings: StreamMapping[] = [];
  private videoCodec: VideoCodecOptions | null = null;
  private audioCodec: AudioCodecOptions | null = null;
  private outputArgs: string[] = [];
  private mapMetadata: number | null = null;
  private outputFile: string = '';

  /**
   * Add global arguments (before inputs)
   */
  addGlobalArg(...args: string[]): this {
    this.globalArgs.push(...args);
    return this;
  }

  /**
   * Add input file
   */
  addInput(file: string): this {
    this.inputs.push(file);
    return this;
  }

  /**
   * Map a stream from an input
   */
  map(inputIndex: number, streamSpec: string, optional: boolean = false): this {
    this.mappings.push({ inputIndex, streamSpec, optional });
    return this;
  }

  /**
   * Map video streams from input
   */
  mapVideo(inputIndex: number = 0, streamIndex?: number, optional: boolean = true): this {
    const spec = streamIndex !== undefined ? `v:${streamIndex}` : 'v';
    return this.map(inputIndex, spec, optional);
  }

  /**
   * Map audio streams from input
   */
  mapAudio(inputIndex: number = 0, streamIndex?: number, optional: boolean = true): this {
    const spec = streamIndex !== undefined ? `a:${streamIndex}` : 'a';
    return this.map(inputIndex, spec, optional);
  }

  setVideoCodec(options: VideoCodecOptions): this {
    this.videoCodec = options;
    return this;
  }

  setAudioCodec(options: AudioCodecOptions): this {
    this.audioCodec = options;
    return this;
  }

  /**
   * Copy metadata from input
   */
  copyMetadata(inputIndex: number = 0): this {
    this.mapMetadata = inputIndex;
    return this;
  }

  /**
   * Add arguments placed right before the output file
   */
  addOutputArgs(...args: string[]): this {
    this.outputArgs.push(...args);
    return this;
  }

  setOutput(file: string): this {
    this.outputFile = file;
    return this;
  }

  /**
   * Build the command arguments array
   */
  build(): string[] {
    if (this.inputs.length === 0) {
      throw new Error('FFmpeg command has no input');
    }
    if (!this.outputFile) {
      throw new Error('FFmpeg command has no output');
    }

    const args: string[] = [...this.globalArgs];

    for (const input of this.inputs) {
      args.push('-i', input);
    }

    for (const mapping of this.mappings) {
      const opt = mapping.optional ? '?' : '';
      args.push('-map', `${mapping.inputIndex}:${mapping.streamSpec}${opt}`);
    }

    const video = this.videoCodec;
    if (video) {
      args.push('-c:v', video.codec);
      if (video.preset) args.push('-preset', video.preset);
      if (video.crf !== undefined) args.push('-crf', video.crf.toString());
      if (video.qscale !== undefined) args.push('-q:v', video.qscale.toString());
      if (video.profile) args.push('-profile:v', video.profile);
      if (video.pixFmt) args.push('-pix_fmt', video.pixFmt);
      if (video.tag) args.push('-tag:v', video.tag);
    }

    const audio = this.audioCodec;
    if (audio) {
      args.push('-c:a', audio.codec);
      if (audio.bitrate) args.push('-b:a', audio.bitrate);
    }

    if (this.mapMetadata !== null) {
      args.push('-map_metadata', this.mapMetadata.toString());
    }

    args.push(...this.outputArgs);
    args.push(this.outputFile);

    return args;
  }
}
