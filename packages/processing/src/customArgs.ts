/**
 * Custom Profile Arguments
 *
 * A custom profile carries a free-form parameter string that is spliced
 * into the engine's argument vector. Engines are spawned without a shell;
 * strings carrying shell syntax are refused.
 */

import { PreflightError } from '@vconvert/core';

const SHELL_METACHARACTERS = /[;&|$`<>(){}\\\r\n\0]/;

/**
 * Split a parameter string into tokens, honoring single and double quotes
 */
export function tokenizeArgs(raw: string): string[] {
  const tokens: string[] = [];
  let current = '';
  let inToken = false;
  let quote: '"' | "'" | null = null;

  for (const char of raw) {
    if (quote) {
      if (char === quote) {
        quote = null;
      } else {
        current += char;
      }
      continue;
    }

    if (char === '"' || char === "'") {
      quote = char;
      inToken = true;
      continue;
    }

    if (/\s/.test(char)) {
      if (inToken) {
        tokens.push(current);
        current = '';
        inToken = false;
      }
      continue;
    }

    current += char;
    inToken = true;
  }

  if (quote) {
    throw new PreflightError(`Unterminated ${quote} quote in custom parameters`, { raw });
  }
  if (inToken) {
    tokens.push(current);
  }

  return tokens;
}

/**
 * Validate and tokenize a custom profile's parameter string
 */
export function parseCustomArgs(raw: string | undefined): string[] {
  if (raw === undefined || raw.trim().length === 0) {
    throw new PreflightError('Custom profile requires a parameter string');
  }

  const match = raw.match(SHELL_METACHARACTERS);
  if (match) {
    const shown = JSON.stringify(match[0]);
    throw new PreflightError(`Custom parameters contain shell metacharacter ${shown}`, { raw });
  }

  return tokenizeArgs(raw);
}
