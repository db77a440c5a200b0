/**
 * Engine Registry
 *
 * Maps engine ids to adapters and picks the adapter that runs a job,
 * optionally falling back to another installed engine.
 */

import {
  BinaryLocator,
  ENGINE_IDS,
  EngineUnavailableError,
  PreflightError,
  type ConversionProfile,
  type EngineId,
  type Settings,
} from '@vconvert/core';
import { logger } from '@vconvert/utils';
import type { ProcessLauncher } from '../process.js';
import { AvidemuxEngine } from './avidemux.js';
import { FFmpegEngine } from './ffmpeg.js';
import { HandBrakeEngine } from './handbrake.js';
import type { EngineAdapter } from './types.js';

export interface ResolvedEngine {
  engine: EngineAdapter;
  executable: string;
  fellBack: boolean;
}

export interface EngineStatus {
  id: EngineId;
  displayName: string;
  path: string | null;
  error?: string;
}

export class EngineRegistry {
  private readonly engines = new Map<EngineId, EngineAdapter>();

  constructor(engines: EngineAdapter[] = []) {
    for (const engine of engines) {
      this.register(engine);
    }
  }

  register(engine: EngineAdapter): this {
    this.engines.set(engine.id, engine);
    return this;
  }

  get(id: EngineId): EngineAdapter | undefined {
    return this.engines.get(id);
  }

  /**
   * @throws PreflightError when no adapter is registered under the id
   */
  require(id: EngineId): EngineAdapter {
    const engine = this.engines.get(id);
    if (!engine) {
      throw new PreflightError(`Unknown engine: ${id}`, { engine: id });
    }
    return engine;
  }

  list(): EngineAdapter[] {
    return ENGINE_IDS.flatMap(id => {
      const engine = this.engines.get(id);
      return engine ? [engine] : [];
    });
  }

  /**
   * Locate the engine for a profile. With fallback enabled an unavailable
   * engine is replaced by the first located alternative (in ENGINE_IDS
   * order) that supports the format. Custom parameters are engine
   * specific, so custom profiles never fall back.
   *
   * @throws EngineUnavailableError
   */
  async resolve(profile: ConversionProfile, fallback: boolean = false): Promise<ResolvedEngine> {
    const primary = this.require(profile.engine);

    try {
      return { engine: primary, executable: await primary.locate(), fellBack: false };
    } catch (error) {
      if (!fallback || profile.formatKey === 'custom' || !(error instanceof EngineUnavailableError)) {
        throw error;
      }

      for (const candidate of this.list()) {
        if (candidate.id === primary.id || !candidate.supports(profile.formatKey)) continue;

        try {
          const executable = await candidate.locate();
          logger.warn(
            { requested: primary.id, using: candidate.id, formatKey: profile.formatKey },
            'Engine unavailable, falling back'
          );
          return { engine: candidate, executable, fellBack: true };
        } catch (candidateError) {
          if (!(candidateError instanceof EngineUnavailableError)) throw candidateError;
        }
      }

      throw error;
    }
  }

  /**
   * Availability of every registered engine
   */
  async status(): Promise<EngineStatus[]> {
    return Promise.all(this.list().map(async (engine): Promise<EngineStatus> => {
      try {
        return { id: engine.id, displayName: engine.displayName, path: await engine.locate() };
      } catch (error) {
        if (!(error instanceof EngineUnavailableError)) throw error;
        return { id: engine.id, displayName: engine.displayName, path: null, error: error.message };
      }
    }));
  }
}

/**
 * Registry with the three built-in engines, configured from settings
 */
export function createDefaultEngines(
  settings: Settings,
  options: { launcher?: ProcessLauncher; locator?: BinaryLocator } = {}
): EngineRegistry {
  const locator = options.locator ?? new BinaryLocator({
    overrides: {
      ffmpeg: settings.binaries.ffmpeg,
      ffprobe: settings.binaries.ffprobe,
      handbrake: settings.binaries.handbrake,
      avidemux: settings.binaries.avidemux,
    },
    bundledDir: settings.binaries.bundledDir,
  });

  const adapterOptions = {
    locator,
    launcher: options.launcher,
    terminateGraceMs: settings.jobs.terminateGraceMs,
  };

  return new EngineRegistry([
    new FFmpegEngine(adapterOptions),
    new HandBrakeEngine(adapterOptions),
    new AvidemuxEngine(adapterOptions),
  ]);
}
