#!/usr/bin/env node
/**
 * CLI Entry Point
 * 
 * Command-line front end for the conversion engine. Scans a directory,
 * queues the files and renders progress; all conversion logic lives in
 * @vconvert/processing.
 */

import { Command, CommanderError } from 'commander';
import chalk from 'chalk';
import { describeError } from '@vconvert/core';

// Commands
import { convertCommand } from './commands/convert.js';
import { scanCommand } from './commands/scan.js';
import { enginesCommand } from './commands/engines.js';
import { formatsCommand } from './commands/formats.js';

const program = new Command();

program
  .name('vconvert')
  .description('Batch video converter (FFmpeg, HandBrakeCLI, Avidemux)')
  .version('1.0.0');

// ============================================
// CONVERSION
// ============================================

program
  .command('convert <inputDir> <outputDir>')
  .description('Convert every video file in a directory')
  .option('-e, --engine <engine>', 'Engine (ffmpeg, handbrake, avidemux)', 'ffmpeg')
  .option('-f, --format <format>', 'Output format (prores, dnxhr, mjpeg, h264, h265, xvid, custom)', 'mjpeg')
  .option('-c, --conflict <policy>', 'When the output exists (overwrite, skip, suffix, timestamp)', 'overwrite')
  .option('--custom-args <args>', 'Engine parameters for the custom format')
  .option('--extension <ext>', 'Output extension for the custom format')
  .option('--no-recursive', 'Do not descend into subdirectories')
  .option('--fallback', 'Use another installed engine when the chosen one is missing')
  .option('-v, --verbose', 'Print engine output')
  .option('--json', 'Print events as JSON lines')
  .option('--debug', 'Enable debug logging')
  .action(convertCommand);

// ============================================
// INFORMATION
// ============================================

program
  .command('scan <dir>')
  .description('List the video files a conversion would pick up')
  .option('--no-recursive', 'Do not descend into subdirectories')
  .option('--json', 'Output in JSON format')
  .action(scanCommand);

program
  .command('engines')
  .description('Show installed conversion engines')
  .option('--json', 'Output in JSON format')
  .action(enginesCommand);

program
  .command('formats')
  .description('List output formats')
  .option('--json', 'Output in JSON format')
  .action(formatsCommand);

// ============================================
// ERROR HANDLING
// ============================================

program.exitOverride();

try {
  await program.parseAsync();
} catch (error) {
  if (error instanceof CommanderError) {
    if (error.code === 'commander.unknownCommand') {
      console.log('Run', chalk.cyan('vconvert --help'), 'for available commands');
    }
    process.exit(error.exitCode);
  }
  console.error(chalk.red('✗'), describeError(error));
  process.exit(1);
}
