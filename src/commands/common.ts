// Path: src/commands/common.ts
// Helpers shared by command handlers

import chalk from 'chalk';
import { InvalidArgumentError } from 'commander';
import type { Ora } from 'ora';
import { NotSignedInError, extractErrorMessage } from '../utils/error.js';
import type { ContextOptions } from '../lib/context.js';
import type { StoreCommandOptions } from './types.js';

/**
 * Commander parser for --cache-ttl
 */
export function parseSeconds(value: string): number {
  const seconds = Number(value);
  if (!Number.isInteger(seconds) || seconds < 0) {
    throw new InvalidArgumentError('Must be a non-negative whole number of seconds.');
  }
  return seconds;
}

/**
 * Map shared CLI flags onto context options
 */
export function contextOptions(options: StoreCommandOptions): ContextOptions {
  return {
    account: options.account,
    vault: options.vault,
    cache: options.cache,
    cacheTtl: options.cacheTtl,
  };
}

/**
 * Print an error (with the sign-in hint when relevant) and exit 1
 */
export function exitWithError(err: unknown, spinner?: Ora, label = 'Failed'): never {
  if (spinner?.isSpinning) {
    spinner.fail(label);
  }
  console.error(chalk.red('Error:'), extractErrorMessage(err));
  if (err instanceof NotSignedInError) {
    console.error(chalk.gray('Sign in to the secret store, then run the command again.'));
  }
  process.exit(1);
}

/**
 * Read all of stdin as UTF-8
 */
export async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
  }
  return Buffer.concat(chunks).toString('utf-8');
}
