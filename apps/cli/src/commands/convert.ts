/**
 * Convert Command
 * 
 * Converts every video file of a directory with one profile.
 * Ctrl+C cancels the running job and leaves the rest unstarted.
 */

import { basename } from 'node:path';
import ora from 'ora';
import chalk from 'chalk';
import { ConverterError, describeError, type ConversionProfile } from '@vconvert/core';
import {
  EventChannel,
  createScheduler,
  scanInputDirectory,
  type BatchHandle,
  type DiscoveredFile,
} from '@vconvert/processing';
import { convertOptionsSchema, getSettings } from '../config/index.js';
import { EventRenderer } from '../lib/renderer.js';
import { printError, printInfo, printWarning } from '../lib/output.js';

export async function convertCommand(
  inputDir: string,
  outputDir: string,
  rawOptions: Record<string, unknown>
): Promise<void> {
  const parsed = convertOptionsSchema.safeParse(rawOptions);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    printError(`Invalid option ${issue?.path.join('.') ?? ''}: ${issue?.message ?? 'invalid value'}`);
    process.exit(1);
  }
  const options = parsed.data;

  const settings = getSettings(options.debug);

  const spinner = options.json ? null : ora('Scanning input directory...').start();
  let files: DiscoveredFile[];
  try {
    files = await scanInputDirectory(inputDir, { recursive: options.recursive });
    spinner?.stop();
  } catch (error) {
    spinner?.fail('Scan failed');
    printError(describeError(error));
    process.exit(1);
  }

  if (files.length === 0) {
    printWarning(`No video files found in ${inputDir}`);
    return;
  }

  const profile: ConversionProfile = {
    engine: options.engine,
    formatKey: options.format,
    customArgs: options.customArgs,
    customExtension: options.extension,
  };

  const channel = new EventChannel(settings.events.channelCapacity);
  const scheduler = createScheduler(settings, { sink: channel });
  const renderer = new EventRenderer({ json: options.json, verbose: options.verbose });

  let handle: BatchHandle;
  try {
    handle = await scheduler.submit(
      files.map(file => ({ inputPath: file.path, profile })),
      {
        outputDir,
        conflictPolicy: options.conflict,
        engineFallback: options.fallback,
      }
    );
  } catch (error) {
    printError(error instanceof ConverterError ? error.message : describeError(error));
    process.exit(1);
  }

  if (!options.json) {
    printInfo(`Converting ${chalk.bold(files.length)} file(s) to ${chalk.cyan(options.format)} with ${options.engine}`);
  }

  const onInterrupt = () => {
    const current = scheduler.getCurrentJob();
    const target = current ? ` ${basename(current.inputPath)}` : '';
    printWarning(`Cancelling${target}... (press Ctrl+C again to force quit)`);
    scheduler.cancelAll().catch((error: unknown) => printError(describeError(error)));
  };
  process.once('SIGINT', onInterrupt);

  const rendering = renderer.consume(channel);
  try {
    const summary = await handle.done;

    if (summary.failed > 0) {
      process.exitCode = 1;
    } else if (summary.cancelled > 0 || summary.pending > 0) {
      process.exitCode = 130;
    }
  } finally {
    process.removeListener('SIGINT', onInterrupt);
    channel.close();
    await rendering;
  }
}
