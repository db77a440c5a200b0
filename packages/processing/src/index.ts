/**
 * @vconvert/processing
 *
 * Conversion orchestration layer.
 *
 * RULES:
 * - Engines are spawned with an argument vector, never through a shell
 * - At most one engine process is alive at a time
 * - Every spawned command is logged
 * - A cancelled job leaves no partial output it created
 */

// Scheduler
export {
  ConversionScheduler,
  createScheduler,
  summarize,
  WATCHDOG_REASON,
  type ConversionRequest,
  type SubmitOptions,
  type BatchHandle,
  type SchedulerOptions,
} from './scheduler.js';

// Job Executor
export {
  JobExecutor,
  extractErrorDetail,
  DEFAULT_CANCEL_REASON,
  type JobOutcome,
  type JobRunRequest,
  type JobExecutorOptions,
} from './jobExecutor.js';

// Engines
export { BaseEngineAdapter, type EngineAdapterOptions } from './engines/base.js';
export { FFmpegEngine } from './engines/ffmpeg.js';
export { HandBrakeEngine } from './engines/handbrake.js';
export { AvidemuxEngine } from './engines/avidemux.js';
export {
  EngineRegistry,
  createDefaultEngines,
  type ResolvedEngine,
  type EngineStatus,
} from './engines/registry.js';
export type {
  EngineAdapter,
  BuildCommandOptions,
  ProgressParserOptions,
  ProgressStyle,
} from './engines/types.js';

// Command Builder
export {
  FFmpegCommandBuilder,
  type VideoCodecOptions,
  type AudioCodecOptions,
  type StreamMapping,
} from './commandBuilder.js';

// Format Presets
export {
  FORMAT_PRESETS,
  DEFAULT_CUSTOM_EXTENSION,
  getPreset,
  listPresets,
  getOutputExtension,
  type FormatPreset,
  type PresetKey,
} from './presets.js';

// Custom parameters
export { tokenizeArgs, parseCustomArgs } from './customArgs.js';

// Progress Parser
export {
  TimeProgressParser,
  PercentProgressParser,
  HandBrakeProgressParser,
  type ProgressEvent,
  type ProgressParser,
} from './progressParser.js';

// Conflict Resolution
export {
  ConflictResolver,
  resolveOutputPath,
  type ConflictAction,
  type ConflictResolution,
  type ResolveOptions,
} from './conflictResolver.js';

// Processes
export {
  ChildProcessHandle,
  spawnProcess,
  type ProcessHandle,
  type ProcessExit,
  type ProcessLauncher,
  type OutputLine,
  type OutputStream,
  type ChildLike,
} from './process.js';

// Events
export { EventChannel } from './eventChannel.js';

// Discovery and probing
export {
  scanInputDirectory,
  isVideoFile,
  VIDEO_EXTENSIONS,
  type DiscoveredFile,
  type ScanOptions,
} from './discovery.js';
export { probeDuration, parseProbeDuration } from './probe.js';
