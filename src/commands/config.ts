// Path: src/commands/config.ts
// Configuration commands

import type { Command } from 'commander';
import chalk from 'chalk';
import {
  getConfigPath,
  loadConfig,
  loadStoredConfig,
  removeAccountAlias,
  saveConfig,
  setAccountAlias,
  type InjectConfig,
} from '../lib/config/index.js';
import { formatValidationResult, validateConfig } from '../lib/validation.js';
import type { ConfigShowCommandOptions } from './types.js';

/**
 * Keys accepted by `config set`, each applying a string to the config
 */
const SETTERS: Record<string, (config: InjectConfig, value: string) => void> = {
  defaultVault: (config, value) => {
    config.defaultVault = value;
  },
  defaultField: (config, value) => {
    config.defaultField = value;
  },
  defaultAccount: (config, value) => {
    config.defaultAccount = value === '' ? undefined : value;
  },
  fallbackAccounts: (config, value) => {
    config.fallbackAccounts = value.split(',').map((s) => s.trim()).filter(Boolean);
  },
  cacheTtl: (config, value) => {
    config.cache.ttlSeconds = parseNumber('cacheTtl', value);
  },
  cacheEnabled: (config, value) => {
    if (value !== 'true' && value !== 'false') {
      throw new Error('cacheEnabled must be true or false');
    }
    config.cache.enabled = value === 'true';
  },
  cacheDir: (config, value) => {
    config.cache.dir = value === '' ? undefined : value;
  },
  providerCommand: (config, value) => {
    config.provider.command = value;
  },
  providerTimeoutMs: (config, value) => {
    config.provider.timeoutMs = parseNumber('providerTimeoutMs', value);
  },
  templateExtensions: (config, value) => {
    config.templateExtensions = value.split(',').map((s) => s.trim()).filter(Boolean);
  },
};

function parseNumber(key: string, value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new Error(`${key} must be a number`);
  }
  return parsed;
}

/**
 * Apply `config set <key> <value>` to a configuration
 * @throws Error for unknown keys or unparseable values
 */
export function applyConfigSetting(config: InjectConfig, key: string, value: string): InjectConfig {
  const setter = SETTERS[key];
  if (!setter) {
    throw new Error(`Unknown config key: ${key} (valid: ${Object.keys(SETTERS).join(', ')})`);
  }
  setter(config, value);
  return config;
}

export function registerConfigCommands(program: Command): void {
  const configCmd = program
    .command('config')
    .description('Show and change configuration')
    .addHelpText('after', `
Examples:
  secret-inject config show
  secret-inject config set-alias work acme.1password.com
  secret-inject config set defaultVault Infra
  secret-inject config set cacheTtl 120
`);

  configCmd
    .command('show')
    .description('Print the effective configuration')
    .option('--json', 'Output as JSON')
    .action((options: ConfigShowCommandOptions) => {
      const config = loadConfig();

      if (options.json) {
        console.log(JSON.stringify(config, null, 2));
        return;
      }

      console.log();
      console.log(chalk.bold('Configuration'), chalk.gray(getConfigPath()));
      console.log();
      console.log(`  Default vault:    ${config.defaultVault}`);
      console.log(`  Default field:    ${config.defaultField}`);
      console.log(`  Default account:  ${config.defaultAccount ?? chalk.gray('(store default)')}`);
      if (config.fallbackAccounts.length > 0) {
        console.log(`  Fallback:         ${config.fallbackAccounts.join(', ')}`);
      }
      console.log(`  Cache:            ${config.cache.enabled ? `${config.cache.ttlSeconds}s` : chalk.yellow('disabled')}`);
      if (config.cache.dir) {
        console.log(`  Cache dir:        ${config.cache.dir}`);
      }
      console.log(`  Store command:    ${config.provider.command} (timeout ${config.provider.timeoutMs}ms)`);
      console.log(`  Extensions:       ${config.templateExtensions.join(', ')}`);

      const aliases = Object.entries(config.accounts);
      if (aliases.length > 0) {
        console.log();
        console.log(chalk.bold('Account aliases'));
        for (const [alias, account] of aliases) {
          console.log(`  ${alias.padEnd(16)} ${account}`);
        }
      }
      console.log();
    });

  configCmd
    .command('validate')
    .description('Check the configuration for errors')
    .action(() => {
      const result = validateConfig(loadConfig());
      console.log(formatValidationResult(result));
      if (!result.valid) {
        process.exit(1);
      }
    });

  configCmd
    .command('set-alias <alias> <account>')
    .description('Map an account alias to an account id')
    .action((alias: string, account: string) => {
      setAccountAlias(alias, account);
      console.log(chalk.green('✓') + ` ${alias} -> ${account}`);
    });

  configCmd
    .command('remove-alias <alias>')
    .description('Remove an account alias')
    .action((alias: string) => {
      if (!removeAccountAlias(alias)) {
        console.error(chalk.red(`No alias named ${alias}`));
        process.exit(1);
      }
      console.log(chalk.green('✓') + ` Removed alias ${alias}`);
    });

  configCmd
    .command('set <key> <value>')
    .description(`Set a value (${Object.keys(SETTERS).join(', ')})`)
    .action((key: string, value: string) => {
      let config: InjectConfig;
      try {
        config = applyConfigSetting(loadStoredConfig(), key, value);
      } catch (err) {
        console.error(chalk.red('Error:'), err instanceof Error ? err.message : String(err));
        process.exit(1);
      }

      const result = validateConfig(config);
      if (!result.valid) {
        console.error(formatValidationResult(result));
        process.exit(1);
      }

      saveConfig(config);
      console.log(chalk.green('✓') + ` ${key} = ${value}`);
    });
}
