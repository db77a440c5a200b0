/**
 * Engines Command
 * 
 * Shows which conversion engines are installed and where.
 */

import ora from 'ora';
import chalk from 'chalk';
import { getBinaryFolders, type Settings } from '@vconvert/core';
import { createDefaultEngines } from '@vconvert/processing';
import { getSettings } from '../config/index.js';
import { printHeader, printJson, printKeyValue } from '../lib/output.js';

interface EnginesOptions {
  json?: boolean;
}

/**
 * Folder searched for bundled engine binaries
 */
export function bundledBinariesFolder(settings: Settings): string {
  return settings.binaries.bundledDir ?? getBinaryFolders().os;
}

export async function enginesCommand(options: EnginesOptions): Promise<void> {
  const settings = getSettings();
  const registry = createDefaultEngines(settings);

  const spinner = options.json ? null : ora('Locating engines...').start();
  const statuses = await registry.status();
  spinner?.stop();

  if (options.json) {
    printJson(statuses);
    return;
  }

  printHeader('Engines');
  for (const status of statuses) {
    const state = status.path ? chalk.green('✓') : chalk.red('✗');
    const where = status.path ?? chalk.gray('not found');
    console.log(`  ${state} ${status.displayName.padEnd(14)} ${where}`);
  }

  console.log();
  printKeyValue('Bundled binaries', bundledBinariesFolder(settings));
}
