/**
 * Job Executor
 *
 * Runs one RUNNING job to a terminal outcome: builds the engine command,
 * spawns the engine, relays its output as log and progress events and
 * classifies the exit. State transitions stay with the scheduler.
 */

import {
  INDETERMINATE_PROGRESS,
  SubprocessError,
  describeError,
  type ConversionEvent,
  type Job,
} from '@vconvert/core';
import { createLogger, getFileSizeBytes, removeFile } from '@vconvert/utils';
import type { EngineAdapter } from './engines/types.js';
import type { ProcessExit, ProcessHandle } from './process.js';

const logger = createLogger({ module: 'job-executor' });

export type JobOutcome =
  | { state: 'COMPLETED'; reason: string }
  | { state: 'FAILED'; reason: string; error: Error }
  | { state: 'CANCELLED'; reason: string };

export interface JobRunRequest {
  job: Job;
  engine: EngineAdapter;
  executable: string;
  overwrite: boolean;
  outputPreexisted: boolean;
  signal: AbortSignal;
}

export interface JobExecutorOptions {
  publish: (event: ConversionEvent) => Promise<void>;
  maxLogLines?: number;
  encoderThreads?: number;
}

export const DEFAULT_CANCEL_REASON = 'Cancelled by user';

// stderr lines kept for error extraction
const ERROR_TAIL_LINES = 50;

/**
 * Pull the most useful error line out of engine output
 */
export function extractErrorDetail(lines: readonly string[]): string {
  const text = lines.join('\n');

  const patterns = [
    /Error[:\s](.+?)(?:\n|$)/i,
    /Invalid[:\s](.+?)(?:\n|$)/i,
    /No such file or directory/,
    /Permission denied/,
    /Cannot open/,
    /Conversion failed/,
  ];

  for (const pattern of patterns) {
    const match = text.match(pattern);
    if (match) {
      return (match[1] ?? match[0]).trim();
    }
  }

  // Last few lines if no specific error found
  return lines.slice(-3).join('\n');
}

function abortReason(signal: AbortSignal): string {
  return typeof signal.reason === 'string' ? signal.reason : DEFAULT_CANCEL_REASON;
}

export class JobExecutor {
  private readonly publish: (event: ConversionEvent) => Promise<void>;
  private readonly maxLogLines: number;
  private readonly encoderThreads: number;

  constructor(options: JobExecutorOptions) {
    this.publish = options.publish;
    this.maxLogLines = options.maxLogLines ?? 1000;
    this.encoderThreads = options.encoderThreads ?? 0;
  }

  /**
   * Execute a job. Conversion failures, including filesystem errors on
   * the output, come back as outcomes rather than exceptions.
   */
  async execute(request: JobRunRequest): Promise<JobOutcome> {
    const { job, engine, executable, signal } = request;
    const outputPath = job.outputPath;

    if (!outputPath) {
      return this.failed(new SubprocessError('Job has no resolved output path', null));
    }

    let args: string[];
    try {
      args = engine.buildCommand({
        inputPath: job.inputPath,
        outputPath,
        profile: job.profile,
        overwrite: request.overwrite,
        threads: this.encoderThreads,
      });
    } catch (error) {
      return this.failed(error);
    }

    if (signal.aborted) {
      return { state: 'CANCELLED', reason: abortReason(signal) };
    }

    let durationMs: number | undefined;
    if (engine.probeDurationMs) {
      durationMs = await engine.probeDurationMs(job.inputPath, signal);
      logger.debug({ jobId: job.id, durationMs }, 'Probed input duration');
    }

    if (signal.aborted) {
      return { state: 'CANCELLED', reason: abortReason(signal) };
    }

    await this.appendLog(job, `$ ${[executable, ...args].join(' ')}`);

    let handle: ProcessHandle;
    try {
      handle = engine.start(executable, args);
    } catch (error) {
      return this.failed(new SubprocessError(
        `Failed to start ${engine.displayName}: ${describeError(error)}`,
        null
      ));
    }

    const parser = engine.createProgressParser({ durationMs });
    const stderrTail: string[] = [];

    const pending: { termination?: Promise<ProcessExit> } = {};
    const onAbort = () => {
      logger.info({ jobId: job.id, reason: abortReason(signal) }, 'Terminating engine');
      pending.termination = engine.terminate(handle);
    };
    signal.addEventListener('abort', onAbort, { once: true });
    if (signal.aborted) {
      signal.removeEventListener('abort', onAbort);
      onAbort();
    }

    let exit: ProcessExit;
    try {
      for await (const { stream, line } of handle.lines()) {
        await this.appendLog(job, line);

        if (stream === 'stderr') {
          stderrTail.push(line);
          if (stderrTail.length > ERROR_TAIL_LINES) stderrTail.shift();
        }

        const progress = parser.feed(line);
        if (progress) {
          await this.updateProgress(job, progress.percent);
        }
      }
      exit = await handle.exited;
    } finally {
      signal.removeEventListener('abort', onAbort);
      if (handle.isAlive()) {
        await engine.terminate(handle);
      }
      if (pending.termination) {
        await pending.termination;
      }
    }

    for (const anomaly of parser.anomalies) {
      logger.warn({ jobId: job.id, engine: engine.id, details: anomaly.details }, anomaly.message);
    }

    if (signal.aborted) {
      if (!request.outputPreexisted) {
        await this.removePartialOutput(job, outputPath);
      }
      return { state: 'CANCELLED', reason: abortReason(signal) };
    }

    if (exit.error) {
      return this.failed(new SubprocessError(
        `Failed to start ${engine.displayName}: ${exit.error.message}`,
        null
      ));
    }

    if (exit.exitCode !== 0) {
      const detail = extractErrorDetail(stderrTail.length > 0 ? stderrTail : job.logLines);
      const how = exit.exitCode === null
        ? `was terminated by ${exit.signal ?? 'a signal'}`
        : `exited with code ${exit.exitCode}`;
      return this.failed(new SubprocessError(
        `${engine.displayName} ${how}${detail ? `: ${detail}` : ''}`,
        exit.exitCode,
        { signal: exit.signal }
      ));
    }

    let size: number | null;
    try {
      size = await getFileSizeBytes(outputPath);
    } catch (error) {
      return this.failed(error);
    }
    if (size === null || size === 0) {
      return this.failed(new SubprocessError(
        `${engine.displayName} exited cleanly but produced no output`,
        0,
        { outputPath }
      ));
    }

    if (parser.lastPercent !== 100) {
      await this.updateProgress(job, 100);
    }
    return { state: 'COMPLETED', reason: 'Conversion completed' };
  }

  private async removePartialOutput(job: Job, outputPath: string): Promise<void> {
    try {
      if (await removeFile(outputPath)) {
        logger.info({ jobId: job.id, outputPath }, 'Removed partial output');
      }
    } catch (error) {
      logger.warn({ err: error, jobId: job.id, outputPath }, 'Could not remove partial output');
    }
  }

  private failed(error: unknown): JobOutcome {
    const normalized = error instanceof Error ? error : new Error(describeError(error));
    return { state: 'FAILED', reason: normalized.message, error: normalized };
  }

  private async appendLog(job: Job, line: string): Promise<void> {
    job.logLines.push(line);
    if (job.logLines.length > this.maxLogLines) {
      job.logLines.splice(0, job.logLines.length - this.maxLogLines);
    }
    await this.publish({ type: 'LogAppended', jobId: job.id, line });
  }

  private async updateProgress(job: Job, percent: number): Promise<void> {
    if (percent !== INDETERMINATE_PROGRESS) {
      job.progressPercent = Math.max(job.progressPercent, percent);
    }
    await this.publish({ type: 'ProgressUpdated', jobId: job.id, percent });
  }
}
