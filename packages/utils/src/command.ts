/**
 * Command Execution Wrapper
 * 
 * Runs a short-lived external command (probes, version checks) with:
 * - Timeout handling
 * - Output capture
 * - Abort signal support
 * 
 * Long-running engine processes go through ProcessHandle in
 * @vconvert/processing instead, which streams their output.
 */

import { spawn } from 'node:child_process';

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  duration: number;
  timedOut: boolean;
}

export interface CommandOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  timeout?: number; // milliseconds
  maxOutputSize?: number; // bytes
  signal?: AbortSignal;
}

/**
 * Execute an external command with an argument vector (never a shell)
 *
 * Rejects when the process cannot be spawned at all, or when the signal
 * is already aborted (nothing is spawned then).
 */
export async function executeCommand(
  command: string,
  args: string[],
  options: CommandOptions = {}
): Promise<CommandResult> {
  const {
    cwd = process.cwd(),
    env = process.env,
    timeout = 300000, // 5 minutes default
    maxOutputSize = 10 * 1024 * 1024, // 10MB default
    signal,
  } = options;

  const startTime = Date.now();
  let timedOut = false;

  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new Error(`Command aborted before start: ${command}`));
      return;
    }

    const child = spawn(command, args, {
      cwd,
      env,
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    let stdout = '';
    let stderr = '';
    let stdoutSize = 0;
    let stderrSize = 0;
    let killTimer: NodeJS.Timeout | null = null;

    const terminate = () => {
      child.kill('SIGTERM');
      killTimer = setTimeout(() => child.kill('SIGKILL'), 10000);
    };

    const timeoutId = setTimeout(() => {
      timedOut = true;
      terminate();
    }, timeout);

    const onAbort = () => terminate();
    signal?.addEventListener('abort', onAbort, { once: true });

    child.stdout.on('data', (data: Buffer) => {
      if (stdoutSize < maxOutputSize) {
        stdout += data.toString();
        stdoutSize += data.length;
      }
    });

    child.stderr.on('data', (data: Buffer) => {
      if (stderrSize < maxOutputSize) {
        stderr += data.toString();
        stderrSize += data.length;
      }
    });

    const cleanup = () => {
      clearTimeout(timeoutId);
      if (killTimer) clearTimeout(killTimer);
      signal?.removeEventListener('abort', onAbort);
    };

    child.on('close', (code, exitSignal) => {
      cleanup();
      resolve({
        exitCode: code ?? (exitSignal ? 128 : 1),
        stdout,
        stderr,
        duration: Date.now() - startTime,
        timedOut,
      });
    });

    child.on('error', (error) => {
      cleanup();
      reject(error);
    });
  });
}
