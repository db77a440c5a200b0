/**
 * Job Types
 *
 * A job is one input-file-to-output-file conversion request plus its
 * run state. Jobs live in memory only.
 */

export const JOB_STATES = ['PENDING', 'RUNNING', 'COMPLETED', 'FAILED', 'CANCELLED'] as const;
export type JobState = typeof JOB_STATES[number];

export const ENGINE_IDS = ['ffmpeg', 'handbrake', 'avidemux'] as const;
export type EngineId = typeof ENGINE_IDS[number];

export const FORMAT_KEYS = ['prores', 'dnxhr', 'mjpeg', 'h264', 'h265', 'xvid', 'custom'] as const;
export type FormatKey = typeof FORMAT_KEYS[number];

export const CONFLICT_POLICIES = ['overwrite', 'skip', 'suffix', 'timestamp'] as const;
export type ConflictPolicy = typeof CONFLICT_POLICIES[number];

export interface ConversionProfile {
  engine: EngineId;
  formatKey: FormatKey;
  customArgs?: string;       // Passed verbatim to the engine for 'custom'
  customExtension?: string;  // Output extension for 'custom' (default .mkv)
}

export interface Job {
  id: string;
  batchId: string;
  inputPath: string;
  desiredOutputPath: string;
  outputPath: string | null;
  profile: ConversionProfile;
  state: JobState;
  progressPercent: number;
  logLines: string[];
  errorDetail: string | null;
  note: string | null;
  skipped: boolean;
  engineUsed: EngineId | null;
  createdAt: Date;
  startedAt: Date | null;
  finishedAt: Date | null;
}

/**
 * Read-only copy of a job handed to event consumers
 */
export type JobSnapshot = Readonly<Omit<Job, 'logLines' | 'profile'>> & {
  readonly logLines: readonly string[];
  readonly profile: Readonly<ConversionProfile>;
};

export function isTerminalState(state: JobState): boolean {
  return state === 'COMPLETED' || state === 'FAILED' || state === 'CANCELLED';
}

export function snapshotJob(job: Job): JobSnapshot {
  return Object.freeze({
    ...job,
    profile: Object.freeze({ ...job.profile }),
    logLines: Object.freeze([...job.logLines]),
    createdAt: new Date(job.createdAt),
    startedAt: job.startedAt ? new Date(job.startedAt) : null,
    finishedAt: job.finishedAt ? new Date(job.finishedAt) : null,
  });
}
