/**
 * Progress Parser
 * 
 * Incremental, per-engine parsers that turn raw engine output lines into
 * normalized progress events. A fresh parser is created for every run.
 *
 * Every parser guarantees:
 * - percent is an integer in [0, 100], or INDETERMINATE_PROGRESS
 * - an event is produced only when the percentage rises, so output that
 *   reports a lower value than before yields nothing
 */

import { INDETERMINATE_PROGRESS, ParseAnomaly } from '@vconvert/core';
import { parseTimecode } from '@vconvert/utils';

export interface ProgressEvent {
  percent: number;
  rawLine: string;
}

export interface ProgressParser {
  /**
   * Consume one output line; returns at most one event
   */
  feed(line: string): ProgressEvent | null;

  /** Last emitted percentage, null before the first event */
  readonly lastPercent: number | null;

  /** Recognized-but-unusable output seen so far */
  readonly anomalies: readonly ParseAnomaly[];
}

abstract class BaseProgressParser implements ProgressParser {
  private last: number | null = null;
  private readonly found: ParseAnomaly[] = [];

  abstract feed(line: string): ProgressEvent | null;

  get lastPercent(): number | null {
    return this.last;
  }

  get anomalies(): readonly ParseAnomaly[] {
    return this.found;
  }

  protected emitPercent(value: number, rawLine: string): ProgressEvent | null {
    if (!Number.isFinite(value)) return null;

    const percent = Math.min(100, Math.max(0, Math.round(value)));
    if (this.last !== null && percent <= this.last) {
      return null;
    }

    this.last = percent;
    return { percent, rawLine };
  }

  protected emitIndeterminate(rawLine: string): ProgressEvent | null {
    if (this.last !== null) return null;
    this.last = INDETERMINATE_PROGRESS;
    return { percent: INDETERMINATE_PROGRESS, rawLine };
  }

  protected recordAnomaly(message: string, rawLine: string): void {
    if (this.found.some(anomaly => anomaly.message === message)) return;
    this.found.push(new ParseAnomaly(message, { rawLine }));
  }
}

/**
 * Parser for engines that report elapsed media time (FFmpeg).
 *
 * Understands both the `-progress pipe:1` key=value block and the classic
 * stderr status line:
 *   out_time_us=42000000 / out_time_ms=42000000 / out_time=00:00:42.000000
 *   frame= 1000 fps=24.5 q=28.0 size= 1234kB time=00:00:42.00 bitrate= 240.5kbits/s speed=2.01x
 *
 * The total duration comes from a pre-probe, or failing that from the
 * "Duration:" line of the input banner.
 */
export class TimeProgressParser extends BaseProgressParser {
  private durationMs: number | null;

  constructor(durationMs?: number | null) {
    super();
    this.durationMs = durationMs && durationMs > 0 ? durationMs : null;
  }

  get totalDurationMs(): number | null {
    return this.durationMs;
  }

  feed(line: string): ProgressEvent | null {
    const text = line.trim();

    const banner = text.match(/^Duration:\s*(\d+:\d{2}:\d{2}(?:\.\d+)?)/);
    if (banner) {
      if (this.durationMs === null) {
        const learned = parseTimecode(banner[1] ?? '');
        if (learned !== null && learned > 0) {
          this.durationMs = learned;
        }
      }
      return null;
    }

    if (text === 'progress=end') {
      return this.emitPercent(100, line);
    }

    const elapsedMs = this.readElapsedMs(text);
    if (elapsedMs === null) return null;

    if (this.durationMs === null) {
      this.recordAnomaly('Total duration unknown; progress is indeterminate', line);
      return this.emitIndeterminate(line);
    }

    return this.emitPercent((elapsedMs / this.durationMs) * 100, line);
  }

  private readElapsedMs(text: string): number | null {
    const pair = text.match(/^(out_time_us|out_time_ms|out_time)=(.+)$/);
    if (pair) {
      const [, key, value = ''] = pair;
      if (key === 'out_time') {
        return parseTimecode(value);
      }
      // Both counters are in microseconds
      const micros = Number.parseInt(value, 10);
      return Number.isFinite(micros) ? Math.max(0, micros / 1000) : null;
    }

    const status = text.match(/(?:^|\s)time=\s*(-?\d+:\d{2}:\d{2}(?:\.\d+)?)/);
    if (status) {
      return parseTimecode(status[1] ?? '');
    }

    return null;
  }
}

/**
 * Parser for engines that print an explicit percentage token
 */
export class PercentProgressParser extends BaseProgressParser {
  private readonly pattern: RegExp;

  /**
   * @param pattern - must capture the percentage number in group 1
   */
  constructor(pattern: RegExp) {
    super();
    this.pattern = pattern;
  }

  feed(line: string): ProgressEvent | null {
    const match = line.match(this.pattern);
    if (!match) return null;

    const value = Number.parseFloat(match[1] ?? '');
    if (!Number.isFinite(value) || value > 100) {
      this.recordAnomaly('Percentage out of range', line);
      return null;
    }

    return this.emitPercent(value, line);
  }
}

/**
 * HandBrakeCLI status lines:
 *   Encoding: task 1 of 2, 45.23 % (87.14 fps, avg 90.00 fps, ETA 00h01m02s)
 *
 * Multi-pass encodes restart the percentage for every task, so the
 * overall value is scaled by the task index.
 */
export class HandBrakeProgressParser extends BaseProgressParser {
  private static readonly STATUS =
    /Encoding:\s*task\s+(\d+)\s+of\s+(\d+),\s*(\d+(?:\.\d+)?)\s*%/;

  feed(line: string): ProgressEvent | null {
    const match = line.match(HandBrakeProgressParser.STATUS);
    if (!match) return null;

    const task = Number.parseInt(match[1] ?? '1', 10);
    const tasks = Number.parseInt(match[2] ?? '1', 10);
    const percent = Number.parseFloat(match[3] ?? '0');

    if (tasks < 1 || task < 1 || task > tasks || percent > 100) {
      this.recordAnomaly('Unexpected HandBrake status line', line);
      return null;
    }

    return this.emitPercent(((task - 1) * 100 + percent) / tasks, line);
  }
}
