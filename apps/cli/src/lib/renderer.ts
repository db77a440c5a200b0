/**
 * Event Renderer
 *
 * Turns scheduler events into terminal output: one ora spinner for the
 * running job, a line per finished job, or JSON lines with --json.
 */

import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import { basename } from 'node:path';
import { INDETERMINATE_PROGRESS, type ConversionEvent, type JobStateChangedEvent } from '@vconvert/core';
import { formatDuration } from '@vconvert/utils';
import { formatProgressBar, formatSummary, printJsonLine } from './output.js';

export interface RendererOptions {
  json?: boolean;
  verbose?: boolean;
}

export class EventRenderer {
  private readonly options: RendererOptions;
  private spinner: Ora | null = null;
  private label = '';

  constructor(options: RendererOptions = {}) {
    this.options = options;
  }

  /**
   * Drain an event stream until it ends
   */
  async consume(events: AsyncIterable<ConversionEvent>): Promise<void> {
    try {
      for await (const event of events) {
        this.render(event);
      }
    } finally {
      this.spinner?.stop();
      this.spinner = null;
    }
  }

  render(event: ConversionEvent): void {
    if (this.options.json) {
      printJsonLine(event);
      return;
    }

    switch (event.type) {
      case 'JobStateChanged':
        this.renderState(event);
        break;

      case 'ProgressUpdated':
        if (this.spinner) {
          const progress = event.percent === INDETERMINATE_PROGRESS
            ? chalk.gray('working...')
            : formatProgressBar(event.percent);
          this.spinner.text = `${this.label} ${progress}`;
        }
        break;

      case 'LogAppended':
        if (this.options.verbose) {
          this.spinner?.clear();
          console.log(chalk.gray(`  ${event.line}`));
          this.spinner?.render();
        }
        break;

      case 'BatchFinished':
        console.log();
        console.log(chalk.bold('Batch finished:'), formatSummary(event.summary));
        break;
    }
  }

  private renderState(event: JobStateChangedEvent): void {
    const { job } = event;
    const name = basename(job.inputPath);
    const output = job.outputPath ? basename(job.outputPath) : '';

    switch (event.state) {
      case 'RUNNING':
        this.label = `${chalk.cyan(name)} ${chalk.gray('→')} ${output}`;
        if (event.reason) {
          console.log(chalk.yellow('!'), `${name}: ${event.reason}`);
        }
        this.spinner = ora({ text: `${this.label} ${formatProgressBar(0)}`, stream: process.stderr }).start();
        break;

      case 'COMPLETED':
        if (job.skipped) {
          console.log(chalk.blue('i'), `${name}: ${event.reason ?? 'Skipped'}`);
        } else {
          const took = job.startedAt && job.finishedAt
            ? chalk.gray(` (${formatDuration(job.finishedAt.getTime() - job.startedAt.getTime())})`)
            : '';
          this.finish(spinner => spinner.succeed(`${name} ${chalk.gray('→')} ${output}${took}`));
        }
        break;

      case 'FAILED':
        this.finish(spinner => spinner.fail(`${name}: ${chalk.red(job.errorDetail ?? event.reason ?? 'failed')}`));
        break;

      case 'CANCELLED':
        this.finish(spinner => spinner.warn(`${name}: ${event.reason ?? 'Cancelled'}`));
        break;

      case 'PENDING':
        break;
    }
  }

  private finish(apply: (spinner: Ora) => void): void {
    const spinner = this.spinner ?? ora({ stream: process.stderr });
    apply(spinner);
    this.spinner = null;
  }
}
