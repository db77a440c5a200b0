/**
 * Job State Machine
 * 
 * Strict state machine for the conversion job lifecycle.
 * 
 * State Flow:
 * PENDING → RUNNING → COMPLETED | FAILED | CANCELLED
 * PENDING → COMPLETED          (output skipped by conflict policy)
 * PENDING → CANCELLED
 * 
 * Rules:
 * - Transitions only move forward; terminal states are final
 * - Invalid transitions throw StateTransitionError
 */

import type { JobState } from './types/job.js';
import { StateTransitionError } from './errors/index.js';

export type { JobState };

/**
 * Represents a state transition with metadata
 */
export interface JobStateTransition {
  from: JobState;
  to: JobState;
  timestamp: Date;
  reason?: string;
}

const validTransitions: Record<JobState, ReadonlySet<JobState>> = {
  PENDING: new Set<JobState>([
    'RUNNING',
    'COMPLETED', // Skipped without running an engine
    'CANCELLED',
  ]),
  RUNNING: new Set<JobState>([
    'COMPLETED',
    'FAILED',
    'CANCELLED',
  ]),
  COMPLETED: new Set<JobState>([]),
  FAILED: new Set<JobState>([]),
  CANCELLED: new Set<JobState>([]),
};

/**
 * Check if a state transition is valid
 */
export function isValidTransition(from: JobState, to: JobState): boolean {
  return validTransitions[from].has(to);
}

/**
 * Get all valid next states from the current state
 */
export function getNextStates(current: JobState): JobState[] {
  return Array.from(validTransitions[current]);
}

/**
 * Job State Machine class
 * Validates transitions and keeps their history
 */
export class JobStateMachine {
  private currentState: JobState;
  private history: JobStateTransition[] = [];
  private readonly jobId: string;

  constructor(jobId: string, initialState: JobState = 'PENDING') {
    this.jobId = jobId;
    this.currentState = initialState;
  }

  getState(): JobState {
    return this.currentState;
  }

  getHistory(): ReadonlyArray<JobStateTransition> {
    return [...this.history];
  }

  canTransitionTo(targetState: JobState): boolean {
    return isValidTransition(this.currentState, targetState);
  }

  /**
   * Transition to a new state
   * Throws StateTransitionError if the transition is invalid
   */
  transitionTo(targetState: JobState, reason?: string): JobStateTransition {
    if (!this.canTransitionTo(targetState)) {
      throw new StateTransitionError(this.jobId, this.currentState, targetState);
    }

    const transition: JobStateTransition = {
      from: this.currentState,
      to: targetState,
      timestamp: new Date(),
      reason,
    };

    this.history.push(transition);
    this.currentState = targetState;

    return transition;
  }

  isTerminal(): boolean {
    return this.currentState === 'COMPLETED'
      || this.currentState === 'FAILED'
      || this.currentState === 'CANCELLED';
  }
}
