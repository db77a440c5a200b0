/**
 * Output Formatter
 * 
 * Consistent CLI output formatting.
 */

import chalk from 'chalk';
import type { BatchSummary, JobState } from '@vconvert/core';

export function printSuccess(message: string): void {
  console.log(chalk.green('✓'), message);
}

export function printError(message: string): void {
  console.error(chalk.red('✗'), message);
}

export function printWarning(message: string): void {
  console.warn(chalk.yellow('!'), message);
}

export function printInfo(message: string): void {
  console.log(chalk.blue('i'), message);
}

export function printJson(data: unknown): void {
  console.log(JSON.stringify(data, null, 2));
}

/**
 * One compact JSON document per line (for --json event streams)
 */
export function printJsonLine(data: unknown): void {
  console.log(JSON.stringify(data));
}

export function printHeader(title: string): void {
  console.log();
  console.log(chalk.bold.underline(title));
  console.log();
}

export function printKeyValue(key: string, value: unknown): void {
  console.log(`  ${chalk.gray(key + ':')} ${String(value)}`);
}

export const stateColors: Record<JobState, (text: string) => string> = {
  PENDING: chalk.gray,
  RUNNING: chalk.blue,
  COMPLETED: chalk.green,
  FAILED: chalk.red,
  CANCELLED: chalk.yellow,
};

/**
 * Text progress bar, e.g. "[#####-----]  50%"
 * Negative values render as an unknown percentage.
 */
export function formatProgressBar(percent: number, width: number = 20): string {
  if (percent < 0) {
    return `[${'?'.repeat(width)}]   ?%`;
  }
  const clamped = Math.min(100, Math.max(0, Math.round(percent)));
  const filled = Math.round((clamped / 100) * width);
  return `[${'#'.repeat(filled)}${'-'.repeat(width - filled)}] ${String(clamped).padStart(3)}%`;
}

export function formatSummary(summary: BatchSummary): string {
  const parts = [
    `${summary.completed - summary.skipped} converted`,
    `${summary.skipped} skipped`,
    `${summary.failed} failed`,
    `${summary.cancelled} cancelled`,
  ];
  if (summary.pending > 0) {
    parts.push(`${summary.pending} not started`);
  }
  return `${parts.join(', ')} (${summary.total} total)`;
}
