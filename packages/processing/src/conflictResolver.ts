/**
 * Conflict Resolver
 * 
 * Decides the final output path of a job when a file already exists at
 * the desired location.
 * 
 * Policies:
 * - overwrite: write to the desired path; the engine truncates the old file
 * - skip: leave the existing file alone and complete the job without running
 * - suffix: clip.mp4 -> clip_1.mp4, clip_2.mp4, ... (first unused number)
 * - timestamp: clip.mp4 -> clip_20240131_154502.mp4, then _1, _2 on collision
 *
 * Resolution is decided against the filesystem as it is at that moment;
 * a file created between resolution and the engine opening it is not
 * detected here. Engines get their no-clobber flag for every policy
 * except overwrite.
 */

import { existsSync } from 'node:fs';
import type { ConflictPolicy } from '@vconvert/core';
import { formatLocalTimestamp, withNameSuffix } from '@vconvert/utils';

export type ConflictAction = 'write' | 'skip';

export interface ConflictResolution {
  path: string;
  action: ConflictAction;
  renamed: boolean;
  reason: string;
}

export interface ResolveOptions {
  exists?: (path: string) => boolean;
  now?: () => Date;
}

function firstFreeSuffix(basePath: string, exists: (path: string) => boolean): string {
  for (let counter = 1; ; counter++) {
    const candidate = withNameSuffix(basePath, String(counter));
    if (!exists(candidate)) return candidate;
  }
}

/**
 * Resolve the output path for one job.
 * Pure given the `exists` snapshot and the clock.
 */
export function resolveOutputPath(
  desiredPath: string,
  policy: ConflictPolicy,
  options: ResolveOptions = {}
): ConflictResolution {
  const exists = options.exists ?? existsSync;
  const now = options.now ?? (() => new Date());

  if (!exists(desiredPath)) {
    return { path: desiredPath, action: 'write', renamed: false, reason: 'No existing file' };
  }

  switch (policy) {
    case 'overwrite':
      return { path: desiredPath, action: 'write', renamed: false, reason: 'Overwriting existing file' };

    case 'skip':
      return { path: desiredPath, action: 'skip', renamed: false, reason: 'Skipped: output already exists' };

    case 'suffix': {
      const path = firstFreeSuffix(desiredPath, exists);
      return { path, action: 'write', renamed: true, reason: 'Output exists; using numbered name' };
    }

    case 'timestamp': {
      const stamped = withNameSuffix(desiredPath, formatLocalTimestamp(now()));
      const path = exists(stamped) ? firstFreeSuffix(stamped, exists) : stamped;
      return { path, action: 'write', renamed: true, reason: 'Output exists; using timestamped name' };
    }
  }
}

/**
 * Batch-scoped resolver. Paths it hands out are remembered, so two jobs
 * of the same batch never get the same renamed output even when the first
 * one failed and left no file behind.
 */
export class ConflictResolver {
  private readonly policy: ConflictPolicy;
  private readonly options: ResolveOptions;
  private readonly reserved = new Set<string>();

  constructor(policy: ConflictPolicy, options: ResolveOptions = {}) {
    this.policy = policy;
    this.options = options;
  }

  getPolicy(): ConflictPolicy {
    return this.policy;
  }

  resolve(desiredPath: string): ConflictResolution {
    const exists = this.options.exists ?? existsSync;
    const resolution = resolveOutputPath(desiredPath, this.policy, {
      ...this.options,
      exists: path => this.reserved.has(path) || exists(path),
    });

    if (resolution.action === 'write' && this.policy !== 'overwrite') {
      this.reserved.add(resolution.path);
    }

    return resolution;
  }

  /**
   * Whether the engine may replace an existing file at the output path
   */
  allowsOverwrite(): boolean {
    return this.policy === 'overwrite';
  }
}
