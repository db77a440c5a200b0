/**
 * @vconvert/core
 * 
 * Core package containing:
 * - Job model and conversion events
 * - Job state machine
 * - Error taxonomy
 * - Settings and binary location
 */

// State machine
export { 
  JobStateMachine,
  isValidTransition,
  getNextStates,
} from './stateMachine.js';

export type { 
  JobStateTransition, 
} from './stateMachine.js';

// Types
export {
  JOB_STATES,
  ENGINE_IDS,
  FORMAT_KEYS,
  CONFLICT_POLICIES,
  isTerminalState,
  snapshotJob,
} from './types/job.js';

export type {
  Job,
  JobState,
  JobSnapshot,
  EngineId,
  FormatKey,
  ConflictPolicy,
  ConversionProfile,
} from './types/job.js';

export { INDETERMINATE_PROGRESS } from './types/events.js';

export type {
  ConversionEvent,
  JobStateChangedEvent,
  ProgressUpdatedEvent,
  LogAppendedEvent,
  BatchFinishedEvent,
  BatchSummary,
  EventSink,
} from './types/events.js';

// Errors
export { 
  ConverterError,
  ValidationError,
  StateTransitionError,
  EngineUnavailableError,
  PreflightError,
  SubprocessError,
  ParseAnomaly,
  describeError,
} from './errors/index.js';

// Settings
export { parseSettings, loadSettings, type Settings } from './config/settings.js';

// Binary location
export {
  BinaryLocator,
  BINARY_SPECS,
  getBinaryFolders,
  type BinaryName,
  type BinarySpec,
  type ResolvedBinary,
  type BinaryLocatorOptions,
} from './config/binaries.js';
