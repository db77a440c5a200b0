/**
 * Process Handle
 *
 * Live engine subprocess with its stdout and stderr read line by line and
 * a bounded graceful-then-forceful termination.
 */

import { spawn } from 'node:child_process';
import type { EventEmitter } from 'node:events';
import type { Readable } from 'node:stream';
import { LineSplitter, logger } from '@vconvert/utils';

export type OutputStream = 'stdout' | 'stderr';

export interface OutputLine {
  stream: OutputStream;
  line: string;
}

export interface ProcessExit {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  error?: Error; // Spawn failure (e.g. ENOENT, EACCES)
}

export interface ProcessHandle {
  readonly pid: number | undefined;
  readonly commandLine: string;

  /** Merged output lines in arrival order; ends when both streams close */
  lines(): AsyncIterable<OutputLine>;

  /** Settles once the process has exited (never rejects) */
  readonly exited: Promise<ProcessExit>;

  isAlive(): boolean;

  /** SIGTERM, then SIGKILL after graceMs; resolves after exit */
  terminate(graceMs: number): Promise<ProcessExit>;
}

/**
 * The parts of a ChildProcess the handle relies on
 */
export interface ChildLike extends EventEmitter {
  readonly pid?: number | undefined;
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  readonly exitCode: number | null;
  readonly signalCode: NodeJS.Signals | null;
  kill(signal?: NodeJS.Signals | number): boolean;
}

// Pause a stream while this many lines are waiting to be consumed
const HIGH_WATER_LINES = 1000;

export class ChildProcessHandle implements ProcessHandle {
  readonly commandLine: string;
  readonly exited: Promise<ProcessExit>;

  private readonly child: ChildLike;
  private readonly queue: OutputLine[] = [];
  private readonly streams: Readable[] = [];
  private openStreams = 0;
  private wake: (() => void) | null = null;
  private settled = false;
  private terminating: Promise<ProcessExit> | null = null;

  constructor(child: ChildLike, commandLine: string) {
    this.child = child;
    this.commandLine = commandLine;

    this.exited = new Promise<ProcessExit>((resolve) => {
      child.once('close', (code: number | null, signal: NodeJS.Signals | null) => {
        this.settled = true;
        resolve({ exitCode: code, signal });
        this.notify();
      });
      child.once('error', (error: Error) => {
        // 'error' without a later 'close' means the process never started
        if (child.pid === undefined) {
          this.settled = true;
          this.openStreams = 0;
          resolve({ exitCode: null, signal: null, error });
          this.notify();
        } else {
          logger.warn({ err: error, pid: child.pid }, 'Engine process error');
        }
      });
    });

    this.attach('stdout', child.stdout);
    this.attach('stderr', child.stderr);
  }

  get pid(): number | undefined {
    return this.child.pid;
  }

  isAlive(): boolean {
    return !this.settled && this.child.exitCode === null && this.child.signalCode === null;
  }

  async *lines(): AsyncIterable<OutputLine> {
    for (;;) {
      const next = this.queue.shift();
      if (next) {
        if (this.queue.length < HIGH_WATER_LINES / 2) {
          for (const stream of this.streams) {
            if (stream.isPaused()) stream.resume();
          }
        }
        yield next;
        continue;
      }

      if (this.openStreams === 0) return;

      await new Promise<void>((resolve) => {
        this.wake = resolve;
      });
    }
  }

  terminate(graceMs: number): Promise<ProcessExit> {
    if (!this.isAlive()) return this.exited;
    if (this.terminating) return this.terminating;

    this.terminating = (async () => {
      this.child.kill('SIGTERM');

      let timer: NodeJS.Timeout | undefined;
      const timedOut = new Promise<'timeout'>((resolve) => {
        timer = setTimeout(() => resolve('timeout'), graceMs);
      });

      const first = await Promise.race([this.exited, timedOut]);
      clearTimeout(timer);

      if (first === 'timeout') {
        logger.warn({ pid: this.child.pid, graceMs }, 'Engine ignored SIGTERM, sending SIGKILL');
        this.child.kill('SIGKILL');
      }

      return this.exited;
    })();

    return this.terminating;
  }

  private attach(name: OutputStream, stream: Readable | null): void {
    if (!stream) return;

    this.streams.push(stream);
    this.openStreams++;
    const splitter = new LineSplitter();
    let closed = false;

    stream.setEncoding('utf8');

    stream.on('data', (chunk: string) => {
      for (const line of splitter.push(chunk)) {
        this.queue.push({ stream: name, line });
      }
      if (this.queue.length >= HIGH_WATER_LINES) {
        stream.pause();
      }
      this.notify();
    });

    const finish = () => {
      if (closed) return;
      closed = true;
      for (const line of splitter.flush()) {
        this.queue.push({ stream: name, line });
      }
      this.openStreams = Math.max(0, this.openStreams - 1);
      this.notify();
    };

    stream.once('end', finish);
    stream.once('close', finish);
    stream.once('error', finish);
  }

  private notify(): void {
    const wake = this.wake;
    this.wake = null;
    wake?.();
  }
}

/**
 * Spawn an engine with an argument vector (no shell)
 */
export function spawnProcess(executable: string, args: string[]): ProcessHandle {
  const child = spawn(executable, args, {
    stdio: ['ignore', 'pipe', 'pipe'],
    windowsHide: true,
  });

  return new ChildProcessHandle(child, [executable, ...args].join(' '));
}

/**
 * Starts an engine process; swapped out in tests
 */
export type ProcessLauncher = (executable: string, args: string[]) => ProcessHandle;
