/**
 * Formats Command
 * 
 * Lists the output formats and the engines that can produce them.
 */

import chalk from 'chalk';
import { FORMAT_KEYS } from '@vconvert/core';
import { DEFAULT_CUSTOM_EXTENSION, createDefaultEngines, getPreset } from '@vconvert/processing';
import { getSettings } from '../config/index.js';
import { printHeader, printJson } from '../lib/output.js';

interface FormatsOptions {
  json?: boolean;
}

export function formatsCommand(options: FormatsOptions): void {
  const engines = createDefaultEngines(getSettings()).list();

  const formats = FORMAT_KEYS.map(key => {
    const preset = getPreset(key);
    return {
      key,
      name: preset?.name ?? 'Custom',
      description: preset?.description ?? 'Engine parameters passed verbatim (--custom-args)',
      extension: preset?.extension ?? `${DEFAULT_CUSTOM_EXTENSION} (or --extension)`,
      engines: engines.filter(engine => engine.supports(key)).map(engine => engine.id),
    };
  });

  if (options.json) {
    printJson(formats);
    return;
  }

  printHeader('Formats');
  for (const format of formats) {
    console.log(`  ${chalk.cyan(format.key.padEnd(8))} ${chalk.bold(format.name)} ${chalk.gray(format.extension)}`);
    console.log(`           ${format.description}`);
    console.log(`           ${chalk.gray('engines:')} ${format.engines.join(', ')}`);
  }
}
