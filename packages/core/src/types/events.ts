/**
 * Conversion Events
 *
 * Immutable messages published by the scheduler. Consumers keep their own
 * state and apply these; they never get a reference to a live Job.
 */

import type { JobSnapshot, JobState } from './job.js';

/** Progress value used while the total duration is unknown */
export const INDETERMINATE_PROGRESS = -1;

export interface JobStateChangedEvent {
  readonly type: 'JobStateChanged';
  readonly jobId: string;
  readonly state: JobState;
  readonly reason?: string;
  readonly job: JobSnapshot;
}

export interface ProgressUpdatedEvent {
  readonly type: 'ProgressUpdated';
  readonly jobId: string;
  readonly percent: number; // 0-100, or INDETERMINATE_PROGRESS
}

export interface LogAppendedEvent {
  readonly type: 'LogAppended';
  readonly jobId: string;
  readonly line: string;
}

export interface BatchSummary {
  readonly total: number;
  readonly completed: number;
  readonly skipped: number;  // Included in completed
  readonly failed: number;
  readonly cancelled: number;
  readonly pending: number;  // Left untouched by a batch cancel
}

export interface BatchFinishedEvent {
  readonly type: 'BatchFinished';
  readonly batchId: string;
  readonly summary: BatchSummary;
}

export type ConversionEvent =
  | JobStateChangedEvent
  | ProgressUpdatedEvent
  | LogAppendedEvent
  | BatchFinishedEvent;

/**
 * Anything that can receive conversion events. The scheduler awaits the
 * returned promise, so a sink may apply backpressure.
 */
export interface EventSink {
  publish(event: ConversionEvent): void | Promise<void>;
}
