// Path: src/commands/secret.ts
// Direct secret store access: get, set, list, exists

import type { Command } from 'commander';
import inquirer from 'inquirer';
import ora from 'ora';
import chalk from 'chalk';
import { createContext } from '../lib/context.js';
import { contextOptions, exitWithError } from './common.js';
import type {
  SecretGetCommandOptions,
  SecretListCommandOptions,
  SecretSetCommandOptions,
  StoreCommandOptions,
} from './types.js';

export function registerSecretCommands(program: Command): void {
  const secretCmd = program
    .command('secret')
    .description('Read and write individual secrets')
    .addHelpText('after', `
Examples:
  secret-inject secret get GITHUB_TOKEN               # print the default field
  secret-inject secret get DB:password --vault Infra  # print a named field
  secret-inject secret set API_KEY                    # prompts for the value
  secret-inject secret list --vault Infra             # item names in a vault
  secret-inject secret exists GITHUB_TOKEN && echo ok
`);

  secretCmd
    .command('get <name>')
    .description('Print a secret value (NAME or NAME:field)')
    .option('--field <field>', 'Field to read (default: configured field)')
    .option('--vault <vault>', 'Vault to read from')
    .option('--account <account>', 'Account alias or id')
    .option('--default <value>', 'Print this instead of failing when the secret does not resolve')
    .option('--no-cache', 'Bypass the lookup cache')
    .action(async (name: string, options: SecretGetCommandOptions) => {
      try {
        // No up-front session check with --default
        const { resolver } = await createContext({ ...contextOptions(options), signIn: options.default === undefined });
        const resolveOptions = { field: options.field, useCache: options.cache !== false };
        const value = options.default !== undefined
          ? await resolver.getOrDefault(name, options.default, resolveOptions)
          : await resolver.resolve(name, resolveOptions);
        process.stdout.write(value.endsWith('\n') ? value : `${value}\n`);
      } catch (err) {
        exitWithError(err);
      }
    });

  secretCmd
    .command('set <name> [value]')
    .description('Create or update a secret (prompts when no value is given)')
    .option('--field <field>', 'Field to write (default: configured field)')
    .option('--vault <vault>', 'Vault to write to')
    .option('--account <account>', 'Account alias or id')
    .option('--category <category>', 'Item category for new items', 'API Credential')
    .action(async (name: string, value: string | undefined, options: SecretSetCommandOptions) => {
      let secretValue = value;
      if (secretValue === undefined) {
        const answers = await inquirer.prompt<{ secretValue: string }>([
          {
            type: 'password',
            name: 'secretValue',
            message: `Value for ${name}:`,
            mask: '*',
            validate: (input: string) => input.length > 0 || 'Value cannot be empty',
          },
        ]);
        secretValue = answers.secretValue;
      }

      const spinner = ora(`Saving ${name}...`).start();
      try {
        const { provider, resolver, cache } = await createContext({ ...contextOptions(options), cache: false });
        const vault = options.vault ?? resolver.defaultVault;
        const field = options.field ?? resolver.defaultField;
        const outcome = await provider.createOrUpdateSecret(name, secretValue, vault, options.category, field);
        cache.clear();
        spinner.succeed(`${outcome === 'created' ? 'Created' : 'Updated'} ${name} in ${vault}`);
      } catch (err) {
        exitWithError(err, spinner, `Failed to save ${name}`);
      }
    });

  secretCmd
    .command('list')
    .description('List item names in a vault')
    .option('--vault <vault>', 'Vault to list')
    .option('--account <account>', 'Account alias or id')
    .option('--json', 'Output as JSON')
    .action(async (options: SecretListCommandOptions) => {
      const spinner = ora('Fetching items...').start();
      try {
        const { provider, resolver } = await createContext(contextOptions(options));
        const vault = options.vault ?? resolver.defaultVault;
        const names = await provider.listSecrets(vault);
        spinner.stop();

        if (options.json) {
          console.log(JSON.stringify(names, null, 2));
          return;
        }
        if (names.length === 0) {
          console.log(`No items in vault ${vault}`);
          return;
        }

        console.log();
        console.log(chalk.bold(`Items in ${vault}`));
        console.log();
        for (const itemName of names) {
          console.log(`  ${itemName}`);
        }
        console.log();
        console.log(`Total: ${names.length} item(s)`);
      } catch (err) {
        exitWithError(err, spinner, 'Failed to list items');
      }
    });

  secretCmd
    .command('exists <name>')
    .description('Exit 0 when the secret resolves, 1 otherwise')
    .option('--vault <vault>', 'Vault to check')
    .option('--account <account>', 'Account alias or id')
    .action(async (name: string, options: StoreCommandOptions) => {
      try {
        const { resolver } = await createContext(contextOptions(options));
        const found = await resolver.exists(name, options.vault);
        if (!found) {
          process.exitCode = 1;
        }
      } catch (err) {
        exitWithError(err);
      }
    });
}
