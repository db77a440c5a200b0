/**
 * Custom Error Classes
 *
 * Taxonomy:
 * - EngineUnavailableError: the engine executable cannot be found; fails one job
 * - PreflightError: bad profile, unreadable input, unwritable output directory
 * - SubprocessError: non-zero exit, missing output, spawn failure
 * - ParseAnomaly: unrecognized progress output; logged, never thrown
 *
 * Cancellation is not an error.
 */

import type { EngineId, JobState } from '../types/job.js';

/**
 * Base error class for all converter errors
 */
export class ConverterError extends Error {
  public readonly code: string;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ConverterError';
    this.code = code;
    this.details = details;
    
    // Maintains proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Validation error for invalid configuration values
 */
export class ValidationError extends ConverterError {
  constructor(field: string, message: string) {
    super(
      `Validation failed for ${field}: ${message}`,
      'VALIDATION_ERROR',
      { field, message }
    );
    this.name = 'ValidationError';
  }
}

/**
 * State transition error for invalid state changes
 */
export class StateTransitionError extends ConverterError {
  constructor(
    jobId: string,
    fromState: JobState,
    toState: JobState
  ) {
    super(
      `Invalid state transition from ${fromState} to ${toState}`,
      'STATE_TRANSITION_ERROR',
      { jobId, fromState, toState }
    );
    this.name = 'StateTransitionError';
  }
}

/**
 * The configured engine executable cannot be located
 */
export class EngineUnavailableError extends ConverterError {
  constructor(engine: EngineId, searched: string[]) {
    super(
      `Engine ${engine} is not available (searched: ${searched.join(', ') || 'nothing'})`,
      'ENGINE_UNAVAILABLE',
      { engine, searched }
    );
    this.name = 'EngineUnavailableError';
  }
}

/**
 * A precondition failed before any process was spawned
 */
export class PreflightError extends ConverterError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'PREFLIGHT_ERROR', details);
    this.name = 'PreflightError';
  }
}

/**
 * The engine process ran but the conversion did not succeed
 */
export class SubprocessError extends ConverterError {
  public readonly exitCode: number | null;

  constructor(message: string, exitCode: number | null, details?: Record<string, unknown>) {
    super(message, 'SUBPROCESS_ERROR', { exitCode, ...details });
    this.name = 'SubprocessError';
    this.exitCode = exitCode;
  }
}

/**
 * Progress output could not be interpreted; progress degrades to
 * indeterminate. Reported through the logger only.
 */
export class ParseAnomaly extends ConverterError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'PARSE_ANOMALY', details);
    this.name = 'ParseAnomaly';
  }
}

/**
 * Human-readable message for anything caught at a job boundary
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
