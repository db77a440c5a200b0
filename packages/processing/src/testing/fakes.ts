/**
 * In-process stand-ins for engines and their processes, used by tests.
 */

import { writeFile } from 'node:fs/promises';
import {
  EngineUnavailableError,
  FORMAT_KEYS,
  type ConversionEvent,
  type EngineId,
  type EventSink,
  type FormatKey,
} from '@vconvert/core';
import type { BuildCommandOptions, EngineAdapter } from '../engines/types.js';
import type { OutputLine, ProcessExit, ProcessHandle } from '../process.js';
import { PercentProgressParser, type ProgressParser } from '../progressParser.js';

export interface FakeRun {
  stdout?: string[];
  stderr?: string[];
  exitCode?: number;
  writeOutput?: boolean; // Default true
  hang?: boolean;        // Keep running until terminated
}

function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}

const tick = () => new Promise<void>((resolve) => setImmediate(resolve));

export class FakeProcess implements ProcessHandle {
  readonly pid = 4242;
  readonly commandLine: string;
  readonly outputPath: string;
  readonly exited: Promise<ProcessExit>;
  readonly outputWritten: Promise<void>;
  readonly terminations: number[] = [];

  private readonly run: FakeRun;
  private readonly exit = deferred<ProcessExit>();
  private readonly written = deferred<void>();
  private readonly killed = deferred<void>();
  private settled = false;

  constructor(commandLine: string, outputPath: string, run: FakeRun) {
    this.commandLine = commandLine;
    this.outputPath = outputPath;
    this.run = run;
    this.exited = this.exit.promise;
    this.outputWritten = this.written.promise;
  }

  isAlive(): boolean {
    return !this.settled;
  }

  async *lines(): AsyncIterable<OutputLine> {
    let wasKilled = false;
    void this.killed.promise.then(() => {
      wasKilled = true;
    });

    if (this.run.writeOutput !== false) {
      await writeFile(this.outputPath, 'encoded');
    }
    this.written.resolve();

    const output: OutputLine[] = [
      ...(this.run.stdout ?? []).map((line): OutputLine => ({ stream: 'stdout', line })),
      ...(this.run.stderr ?? []).map((line): OutputLine => ({ stream: 'stderr', line })),
    ];

    for (const line of output) {
      await tick();
      if (wasKilled) break;
      yield line;
    }

    if (this.run.hang && !wasKilled) {
      await this.killed.promise;
    }

    this.settled = true;
    this.exit.resolve(wasKilled || this.run.hang
      ? { exitCode: null, signal: 'SIGTERM' }
      : { exitCode: this.run.exitCode ?? 0, signal: null });
  }

  terminate(graceMs: number): Promise<ProcessExit> {
    this.terminations.push(graceMs);
    this.killed.resolve();
    return this.exited;
  }
}

export class FakeEngine implements EngineAdapter {
  readonly id: EngineId;
  readonly displayName: string;
  readonly progressStyle = 'percent' as const;

  available = true;
  readonly processes: FakeProcess[] = [];
  onStart: ((process: FakeProcess) => void) | null = null;
  probeDurationMs?: (inputPath: string, signal?: AbortSignal) => Promise<number | undefined>;

  private readonly script: (outputPath: string) => FakeRun;
  private readonly formats: readonly FormatKey[];

  constructor(
    id: EngineId,
    script: (outputPath: string) => FakeRun = () => ({ stdout: ['50%', '100%'] }),
    formats: readonly FormatKey[] = FORMAT_KEYS
  ) {
    this.id = id;
    this.displayName = `Fake ${id}`;
    this.script = script;
    this.formats = formats;
  }

  supports(formatKey: FormatKey): boolean {
    return this.formats.includes(formatKey);
  }

  async locate(): Promise<string> {
    if (!this.available) {
      throw new EngineUnavailableError(this.id, [`/fake/bin/${this.id}`]);
    }
    return `/fake/bin/${this.id}`;
  }

  buildCommand({ inputPath, outputPath }: BuildCommandOptions): string[] {
    return [inputPath, outputPath];
  }

  start(executable: string, args: string[]): ProcessHandle {
    const outputPath = args[1] ?? '';
    const process = new FakeProcess([executable, ...args].join(' '), outputPath, this.script(outputPath));
    this.processes.push(process);
    this.onStart?.(process);
    return process;
  }

  terminate(handle: ProcessHandle): Promise<ProcessExit> {
    return handle.terminate(10);
  }

  createProgressParser(): ProgressParser {
    return new PercentProgressParser(/(\d+(?:\.\d+)?)%/);
  }
}

/**
 * Sink that keeps every event it receives
 */
export class RecordingSink implements EventSink {
  readonly events: ConversionEvent[] = [];

  publish(event: ConversionEvent): void {
    this.events.push(event);
  }

  statesOf(jobId: string): string[] {
    return this.events.flatMap(event =>
      event.type === 'JobStateChanged' && event.jobId === jobId ? [event.state] : []
    );
  }

  progressOf(jobId: string): number[] {
    return this.events.flatMap(event =>
      event.type === 'ProgressUpdated' && event.jobId === jobId ? [event.percent] : []
    );
  }
}
