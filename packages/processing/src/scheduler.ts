/**
 * Conversion Scheduler
 *
 * FIFO queue of conversion jobs drained by a single worker. Batches are
 * validated up front, then every job walks
 *   PENDING -> RUNNING -> COMPLETED | FAILED | CANCELLED
 * (or PENDING -> COMPLETED when the skip policy leaves an existing file).
 *
 * Cancellation has two layers: each batch carries a cancelled flag that
 * is checked between jobs, and the running job owns an AbortController
 * whose abort terminates the engine process.
 */

import { randomUUID } from 'node:crypto';
import { existsSync } from 'node:fs';
import { basename, extname, join, resolve } from 'node:path';
import {
  CONFLICT_POLICIES,
  JobStateMachine,
  PreflightError,
  describeError,
  isTerminalState,
  snapshotJob,
  type BatchSummary,
  type ConflictPolicy,
  type ConversionEvent,
  type ConversionProfile,
  type EventSink,
  type Job,
  type JobSnapshot,
  type JobState,
  type Settings,
} from '@vconvert/core';
import { createLogger, isReadableFile, isWritableDirectory } from '@vconvert/utils';
import { ConflictResolver } from './conflictResolver.js';
import { parseCustomArgs } from './customArgs.js';
import { createDefaultEngines, type EngineRegistry } from './engines/registry.js';
import { DEFAULT_CANCEL_REASON, JobExecutor, type JobOutcome } from './jobExecutor.js';
import { getOutputExtension } from './presets.js';
import type { ProcessLauncher } from './process.js';

const logger = createLogger({ module: 'scheduler' });

// Jobs running at once. The engines saturate the machine on their own.
const MAX_CONCURRENT_JOBS = 1;

export const WATCHDOG_REASON = 'Maximum job duration exceeded';

export interface ConversionRequest {
  inputPath: string;
  profile: ConversionProfile;
}

export interface SubmitOptions {
  outputDir: string;
  conflictPolicy: ConflictPolicy;
  engineFallback?: boolean; // Defaults to the scheduler setting
}

export interface BatchHandle {
  batchId: string;
  jobs: JobSnapshot[];
  done: Promise<BatchSummary>;
}

export interface SchedulerOptions {
  engines: EngineRegistry;
  sink?: EventSink;
  maxLogLines?: number;
  maxJobDurationMs?: number;
  encoderThreads?: number;
  engineFallback?: boolean;
  exists?: (path: string) => boolean;
  now?: () => Date;
}

interface Batch {
  id: string;
  jobs: Job[];
  policy: ConflictPolicy;
  resolver: ConflictResolver;
  fallback: boolean;
  cursor: number;
  cancelled: boolean;
  finish: (summary: BatchSummary) => void;
}

interface RunningJob {
  job: Job;
  controller: AbortController;
  run: Promise<void>;
}

export class ConversionScheduler {
  private readonly engines: EngineRegistry;
  private readonly sink: EventSink | undefined;
  private readonly executor: JobExecutor;
  private readonly maxJobDurationMs: number | undefined;
  private readonly engineFallback: boolean;
  private readonly exists: (path: string) => boolean;
  private readonly now: () => Date;

  private readonly jobs = new Map<string, { job: Job; machine: JobStateMachine }>();
  private readonly batches: Batch[] = [];
  private readonly running = new Map<string, RunningJob>();
  private readonly workers = new Set<Promise<void>>();

  constructor(options: SchedulerOptions) {
    this.engines = options.engines;
    this.sink = options.sink;
    this.maxJobDurationMs = options.maxJobDurationMs;
    this.engineFallback = options.engineFallback ?? false;
    this.exists = options.exists ?? existsSync;
    this.now = options.now ?? (() => new Date());
    this.executor = new JobExecutor({
      publish: event => this.publish(event),
      maxLogLines: options.maxLogLines,
      encoderThreads: options.encoderThreads,
    });
  }

  /**
   * Validate and enqueue a batch. Resolves as soon as the jobs are queued;
   * the returned `done` promise settles when the batch is finished.
   *
   * @throws PreflightError when the batch as a whole cannot run
   */
  async submit(requests: ConversionRequest[], options: SubmitOptions): Promise<BatchHandle> {
    if (requests.length === 0) {
      throw new PreflightError('No input files to convert');
    }

    if (!CONFLICT_POLICIES.includes(options.conflictPolicy)) {
      throw new PreflightError(`Unknown conflict policy: ${options.conflictPolicy}`);
    }

    const outputDir = resolve(options.outputDir);
    if (!(await isWritableDirectory(outputDir))) {
      throw new PreflightError(`Output directory does not exist or is not writable: ${outputDir}`, {
        outputDir,
      });
    }

    for (const request of requests) {
      this.validateProfile(request.profile);
    }

    const batchId = randomUUID();
    const createdAt = this.now();
    const jobs = requests.map((request): Job => {
      const inputPath = resolve(request.inputPath);
      const stem = basename(inputPath, extname(inputPath));
      return {
        id: randomUUID(),
        batchId,
        inputPath,
        desiredOutputPath: join(outputDir, stem + getOutputExtension(request.profile)),
        outputPath: null,
        profile: { ...request.profile },
        state: 'PENDING',
        progressPercent: 0,
        logLines: [],
        errorDetail: null,
        note: null,
        skipped: false,
        engineUsed: null,
        createdAt,
        startedAt: null,
        finishedAt: null,
      };
    });

    let finish: (summary: BatchSummary) => void = () => undefined;
    const done = new Promise<BatchSummary>((resolveDone) => {
      finish = resolveDone;
    });

    const batch: Batch = {
      id: batchId,
      jobs,
      policy: options.conflictPolicy,
      resolver: new ConflictResolver(options.conflictPolicy, { exists: this.exists, now: this.now }),
      fallback: options.engineFallback ?? this.engineFallback,
      cursor: 0,
      cancelled: false,
      finish,
    };

    for (const job of jobs) {
      this.jobs.set(job.id, { job, machine: new JobStateMachine(job.id) });
    }
    this.batches.push(batch);

    logger.info({
      batchId,
      jobs: jobs.length,
      outputDir,
      policy: batch.policy,
    }, 'Batch submitted');

    this.kick();

    return { batchId, jobs: jobs.map(snapshotJob), done };
  }

  /**
   * Cancel the running job; resolves once it has reached a terminal state.
   * The queue then moves on to the next pending job.
   */
  async cancelCurrent(): Promise<void> {
    const current = [...this.running.values()];
    for (const entry of current) {
      logger.info({ jobId: entry.job.id }, 'Cancelling current job');
      entry.controller.abort(DEFAULT_CANCEL_REASON);
    }
    await Promise.all(current.map(entry => entry.run));
  }

  /**
   * Cancel the running job and stop every queued batch. Jobs that never
   * started stay PENDING. Resolves when the worker is idle.
   */
  async cancelAll(): Promise<void> {
    for (const batch of this.batches) {
      batch.cancelled = true;
    }
    for (const entry of this.running.values()) {
      entry.controller.abort(DEFAULT_CANCEL_REASON);
    }
    logger.info({ batches: this.batches.length }, 'Cancelling all batches');
    await this.whenIdle();
  }

  getJobs(): JobSnapshot[] {
    return [...this.jobs.values()].map(entry => snapshotJob(entry.job));
  }

  getJob(jobId: string): JobSnapshot | null {
    const entry = this.jobs.get(jobId);
    return entry ? snapshotJob(entry.job) : null;
  }

  getCurrentJob(): JobSnapshot | null {
    const [entry] = this.running.values();
    return entry ? snapshotJob(entry.job) : null;
  }

  isIdle(): boolean {
    return this.workers.size === 0;
  }

  async whenIdle(): Promise<void> {
    while (this.workers.size > 0) {
      await Promise.all([...this.workers]);
    }
  }

  private validateProfile(profile: ConversionProfile): void {
    const engine = this.engines.require(profile.engine);

    if (!engine.supports(profile.formatKey)) {
      throw new PreflightError(
        `${engine.displayName} does not support the ${profile.formatKey} format`,
        { engine: profile.engine, formatKey: profile.formatKey }
      );
    }

    if (profile.formatKey === 'custom') {
      parseCustomArgs(profile.customArgs);
    }
  }

  private kick(): void {
    while (this.workers.size < MAX_CONCURRENT_JOBS && this.hasWork()) {
      const worker: Promise<void> = this.work().finally(() => {
        this.workers.delete(worker);
        this.kick();
      });
      this.workers.add(worker);
    }
  }

  private hasWork(): boolean {
    return this.batches.length > 0;
  }

  private async work(): Promise<void> {
    for (;;) {
      await this.settleBatches();

      const next = this.takeNext();
      if (!next) return;

      const controller = new AbortController();
      const run = this.runJob(next.batch, next.job, controller);
      this.running.set(next.job.id, { job: next.job, controller, run });
      try {
        await run;
      } finally {
        this.running.delete(next.job.id);
      }
    }
  }

  private takeNext(): { batch: Batch; job: Job } | null {
    for (const batch of this.batches) {
      if (batch.cancelled) continue;
      const job = batch.jobs[batch.cursor];
      if (job) {
        batch.cursor++;
        return { batch, job };
      }
    }
    return null;
  }

  /**
   * Publish BatchFinished for every batch with nothing left to run
   */
  private async settleBatches(): Promise<void> {
    for (const batch of [...this.batches]) {
      const busy = batch.jobs.some(job => this.running.has(job.id));
      const exhausted = batch.cursor >= batch.jobs.length;
      if (busy || !(batch.cancelled || exhausted)) continue;

      this.batches.splice(this.batches.indexOf(batch), 1);

      const summary = summarize(batch.jobs);
      logger.info({ batchId: batch.id, ...summary }, 'Batch finished');
      await this.publish({ type: 'BatchFinished', batchId: batch.id, summary });
      batch.finish(summary);
    }
  }

  private async runJob(batch: Batch, job: Job, controller: AbortController): Promise<void> {
    const resolution = batch.resolver.resolve(job.desiredOutputPath);
    job.outputPath = resolution.path;

    if (resolution.action === 'skip') {
      job.skipped = true;
      await this.transition(job, 'COMPLETED', resolution.reason);
      return;
    }

    const outputPreexisted = this.exists(resolution.path);

    job.progressPercent = 0;
    job.startedAt = this.now();
    await this.transition(job, 'RUNNING', resolution.renamed ? resolution.reason : undefined);

    let watchdog: NodeJS.Timeout | undefined;
    if (this.maxJobDurationMs) {
      watchdog = setTimeout(() => {
        logger.warn({ jobId: job.id, maxJobDurationMs: this.maxJobDurationMs }, WATCHDOG_REASON);
        controller.abort(WATCHDOG_REASON);
      }, this.maxJobDurationMs);
    }

    let outcome: JobOutcome;
    try {
      outcome = await this.execute(batch, job, controller.signal, outputPreexisted);
    } catch (error) {
      logger.error({ err: error, jobId: job.id }, 'Job execution failed unexpectedly');
      const normalized = error instanceof Error ? error : new Error(describeError(error));
      outcome = { state: 'FAILED', reason: normalized.message, error: normalized };
    } finally {
      clearTimeout(watchdog);
    }

    if (outcome.state === 'FAILED') {
      job.errorDetail = outcome.reason;
      logger.error({ jobId: job.id, err: outcome.error }, 'Conversion failed');
    }
    await this.transition(job, outcome.state, outcome.reason);
  }

  private async execute(
    batch: Batch,
    job: Job,
    signal: AbortSignal,
    outputPreexisted: boolean
  ): Promise<JobOutcome> {
    if (!(await isReadableFile(job.inputPath))) {
      throw new PreflightError(`Input file is not readable: ${job.inputPath}`, {
        inputPath: job.inputPath,
      });
    }

    const { engine, executable } = await this.engines.resolve(job.profile, batch.fallback);
    job.engineUsed = engine.id;

    logger.info({
      jobId: job.id,
      engine: engine.id,
      input: job.inputPath,
      output: job.outputPath,
    }, 'Starting conversion');

    return this.executor.execute({
      job,
      engine,
      executable,
      overwrite: batch.resolver.allowsOverwrite(),
      outputPreexisted,
      signal,
    });
  }

  private async transition(job: Job, state: JobState, reason?: string): Promise<void> {
    const entry = this.jobs.get(job.id);
    if (!entry) return;

    const from = entry.machine.getState();
    entry.machine.transitionTo(state, reason);
    job.state = state;

    if (isTerminalState(state)) {
      job.finishedAt = this.now();
      job.note = reason ?? null;
    }

    logger.info({ jobId: job.id, from, to: state, reason }, 'Job state changed');

    await this.publish({
      type: 'JobStateChanged',
      jobId: job.id,
      state,
      reason,
      job: snapshotJob(job),
    });
  }

  private async publish(event: ConversionEvent): Promise<void> {
    if (!this.sink) return;
    try {
      await this.sink.publish(event);
    } catch (error) {
      logger.error({ err: error, event: event.type }, 'Event sink rejected event');
    }
  }
}

/**
 * Count the jobs of a batch by outcome
 */
export function summarize(jobs: readonly Job[]): BatchSummary {
  const count = (state: JobState) => jobs.filter(job => job.state === state).length;
  return {
    total: jobs.length,
    completed: count('COMPLETED'),
    skipped: jobs.filter(job => job.skipped).length,
    failed: count('FAILED'),
    cancelled: count('CANCELLED'),
    pending: count('PENDING'),
  };
}

/**
 * Scheduler wired with the built-in engines and environment settings
 */
export function createScheduler(
  settings: Settings,
  options: { sink?: EventSink; launcher?: ProcessLauncher } = {}
): ConversionScheduler {
  return new ConversionScheduler({
    engines: createDefaultEngines(settings, { launcher: options.launcher }),
    sink: options.sink,
    maxLogLines: settings.jobs.maxLogLines,
    maxJobDurationMs: settings.jobs.maxJobDurationMs,
    encoderThreads: settings.jobs.encoderThreads,
    engineFallback: settings.jobs.engineFallback,
  });
}
