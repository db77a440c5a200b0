/**
 * @vconvert/utils
 * 
 * Shared utilities package containing:
 * - Command execution wrapper
 * - File operations
 * - Path and time helpers
 * - Output line splitting
 * - Logger
 */

// Command execution
export { executeCommand, type CommandResult, type CommandOptions } from './command.js';

// File operations
export {
  getFileSizeBytes,
  removeFile,
  isWritableDirectory,
  isReadableFile,
  isExecutableFile,
  formatBytes,
} from './file.js';

// Path utilities
export {
  getExtension,
  getBasename,
  withNameSuffix,
  normalizeExtension,
} from './path.js';

// Time utilities
export {
  formatDuration,
  parseTimecode,
  formatLocalTimestamp,
} from './time.js';

// Line splitting
export { LineSplitter } from './lines.js';

// Logger
export { logger, createLogger, setLogLevel, type Logger } from './logger.js';
