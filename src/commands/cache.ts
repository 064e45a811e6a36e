// Path: src/commands/cache.ts
// Cache maintenance commands

import type { Command } from 'commander';
import ora from 'ora';
import chalk from 'chalk';
import { createCache, createContext } from '../lib/context.js';
import { loadConfig } from '../lib/config/index.js';
import { contextOptions, exitWithError } from './common.js';
import type { ClearCacheCommandOptions, WarmCacheCommandOptions } from './types.js';

export function registerCacheCommands(program: Command): void {
  program
    .command('warm-cache')
    .description('Look up and cache every item in a vault')
    .option('--vault <vault>', 'Vault to warm (default: configured vault)')
    .option('--account <account>', 'Account alias or id')
    .option('--json', 'Output as JSON')
    .action(async (options: WarmCacheCommandOptions) => {
      const spinner = ora('Checking secret store session...').start();

      try {
        const ctx = await createContext(contextOptions(options));
        if (!ctx.cache.enabled) {
          spinner.warn('Cache is disabled in configuration; nothing to warm');
          return;
        }

        spinner.text = `Caching items from vault ${ctx.resolver.defaultVault}...`;
        const result = await ctx.resolver.warmCache();
        spinner.stop();

        if (options.json) {
          console.log(JSON.stringify(result, null, 2));
        } else {
          console.log(chalk.green('✓') + ` Cached ${result.warmed.length} item(s) from ${result.vault}`);
          for (const identifier of result.failed) {
            console.log(chalk.yellow('⚠') + ` ${identifier} could not be cached`);
          }
        }

        if (result.failed.length > 0) {
          process.exitCode = 1;
        }
      } catch (err) {
        exitWithError(err, spinner, 'Cache warm-up failed');
      }
    });

  program
    .command('clear-cache')
    .description('Delete cached secret values')
    .option('--expired', 'Only remove expired or unreadable entries')
    .action((options: ClearCacheCommandOptions) => {
      const cache = createCache(loadConfig());

      if (options.expired) {
        const removed = cache.sweep();
        console.log(chalk.green('✓') + ` Removed ${removed} expired entr${removed === 1 ? 'y' : 'ies'}`);
        return;
      }

      cache.clear();
      console.log(chalk.green('✓') + ` Cache cleared (${cache.dir})`);
    });
}
