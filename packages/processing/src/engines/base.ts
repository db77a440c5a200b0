/**
 * Base Engine Adapter
 *
 * Shared plumbing for the concrete engines: executable lookup through the
 * BinaryLocator, spawning through a ProcessLauncher, bounded termination.
 */

import {
  BinaryLocator,
  EngineUnavailableError,
  PreflightError,
  type BinaryName,
  type ConversionProfile,
  type EngineId,
  type FormatKey,
} from '@vconvert/core';
import { logger } from '@vconvert/utils';
import { spawnProcess, type ProcessExit, type ProcessHandle, type ProcessLauncher } from '../process.js';
import type { ProgressParser } from '../progressParser.js';
import type {
  BuildCommandOptions,
  EngineAdapter,
  ProgressParserOptions,
  ProgressStyle,
} from './types.js';

export interface EngineAdapterOptions {
  locator?: BinaryLocator;
  launcher?: ProcessLauncher;
  terminateGraceMs?: number;
}

const DEFAULT_TERMINATE_GRACE_MS = 5000;

export abstract class BaseEngineAdapter implements EngineAdapter {
  abstract readonly id: EngineId;
  abstract readonly displayName: string;
  abstract readonly progressStyle: ProgressStyle;

  protected abstract readonly binary: BinaryName;
  protected abstract readonly formats: readonly FormatKey[];

  protected readonly locator: BinaryLocator;
  protected readonly launcher: ProcessLauncher;
  protected readonly terminateGraceMs: number;

  constructor(options: EngineAdapterOptions = {}) {
    this.locator = options.locator ?? new BinaryLocator();
    this.launcher = options.launcher ?? spawnProcess;
    this.terminateGraceMs = options.terminateGraceMs ?? DEFAULT_TERMINATE_GRACE_MS;
  }

  supports(formatKey: FormatKey): boolean {
    return this.formats.includes(formatKey);
  }

  async locate(): Promise<string> {
    const resolved = await this.locator.locate(this.binary);
    if (!resolved) {
      const searched = this.locator.candidates(this.binary).map(candidate => candidate.path);
      throw new EngineUnavailableError(this.id, searched);
    }
    return resolved.path;
  }

  abstract buildCommand(options: BuildCommandOptions): string[];

  abstract createProgressParser(options?: ProgressParserOptions): ProgressParser;

  start(executable: string, args: string[]): ProcessHandle {
    logger.debug({ engine: this.id, command: [executable, ...args].join(' ') }, 'Spawning engine');
    return this.launcher(executable, args);
  }

  terminate(handle: ProcessHandle): Promise<ProcessExit> {
    return handle.terminate(this.terminateGraceMs);
  }

  protected assertSupported(profile: ConversionProfile): void {
    if (!this.supports(profile.formatKey)) {
      throw new PreflightError(
        `${this.displayName} does not support the ${profile.formatKey} format`,
        { engine: this.id, formatKey: profile.formatKey }
      );
    }
  }
}
