/**
 * Scan Command
 * 
 * Lists the video files the convert command would pick up.
 */

import chalk from 'chalk';
import { describeError } from '@vconvert/core';
import { scanInputDirectory } from '@vconvert/processing';
import { formatBytes } from '@vconvert/utils';
import { printError, printHeader, printInfo, printJson } from '../lib/output.js';

interface ScanOptions {
  recursive: boolean;
  json?: boolean;
}

export async function scanCommand(dir: string, options: ScanOptions): Promise<void> {
  try {
    const files = await scanInputDirectory(dir, { recursive: options.recursive });

    if (options.json) {
      printJson(files);
      return;
    }

    if (files.length === 0) {
      printInfo('No video files found');
      return;
    }

    printHeader(`Video files (${files.length})`);
    for (const file of files) {
      console.log(`  ${file.path} ${chalk.gray(formatBytes(file.size))}`);
    }
  } catch (error) {
    printError(describeError(error));
    process.exit(1);
  }
}
