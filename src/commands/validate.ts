// Path: src/commands/validate.ts
// Template validation command

import type { Command } from 'commander';
import chalk from 'chalk';
import { createContext } from '../lib/context.js';
import { validateTemplate, type TemplateValidation } from '../lib/inspect.js';
import type { SecretResolver } from '../lib/resolver.js';
import { TEMPLATE_FORMATS, formatToken, parseFormat, type TemplateFormat } from '../lib/template/index.js';
import { extractErrorMessage } from '../utils/error.js';
import { contextOptions, exitWithError } from './common.js';
import type { ValidateCommandOptions } from './types.js';

function printValidation(validation: TemplateValidation): void {
  console.log(chalk.bold(validation.file));
  console.log(`  Format: ${validation.format}`);

  if (validation.tokens.length === 0) {
    console.log(chalk.gray('  No placeholders'));
  }
  for (const { token, resolvable } of validation.tokens) {
    const name = formatToken(token);
    if (resolvable === undefined) {
      console.log(`  • ${name}`);
    } else if (resolvable) {
      console.log(`  ${chalk.green('✓')} ${name}`);
    } else {
      console.log(`  ${chalk.red('✗')} ${name} ${chalk.gray('(not found)')}`);
    }
  }
  for (const issue of validation.issues) {
    console.log(`  ${chalk.yellow('⚠')} ${issue}`);
  }
  console.log();
}

export function registerValidateCommand(program: Command): void {
  program
    .command('validate')
    .description('Check templates for placeholders and whether each one resolves')
    .argument('<paths...>', 'Template files')
    .option('-f, --format <format>', `Placeholder format: auto, ${TEMPLATE_FORMATS.join(', ')}`, 'auto')
    .option('--vault <vault>', 'Vault for placeholders that do not name one')
    .option('--account <account>', 'Account alias or id')
    .option('--no-check', 'Only parse; do not look secrets up')
    .option('--json', 'Output as JSON')
    .addHelpText('after', `
Examples:
  secret-inject validate .env.template            # parse and check every placeholder
  secret-inject validate *.tmpl --no-check        # offline syntax check
  secret-inject validate app.tpl --json           # JSON output for scripting
`)
    .action(async (paths: string[], options: ValidateCommandOptions) => {
      let format: TemplateFormat | 'auto';
      try {
        format = parseFormat(options.format);
      } catch (err) {
        exitWithError(err);
      }

      let resolver: SecretResolver | undefined;
      if (options.check !== false) {
        try {
          resolver = (await createContext(contextOptions(options))).resolver;
        } catch (err) {
          exitWithError(err);
        }
      }

      const validations: TemplateValidation[] = [];
      const errors: { file: string; error: string }[] = [];

      for (const file of paths) {
        try {
          validations.push(await validateTemplate(file, { format, vault: options.vault, resolver }));
        } catch (err) {
          errors.push({ file, error: extractErrorMessage(err) });
        }
      }

      const unresolved = validations.reduce(
        (count, v) => count + v.tokens.filter((t) => t.resolvable === false).length,
        0
      );

      if (options.json) {
        console.log(JSON.stringify({ templates: validations, errors }, null, 2));
      } else {
        console.log();
        for (const validation of validations) {
          printValidation(validation);
        }
        for (const { file, error } of errors) {
          console.log(`${chalk.red('✗')} ${file}: ${error}`);
        }
        if (unresolved > 0) {
          console.log(chalk.red(`${unresolved} placeholder(s) do not resolve`));
        } else if (errors.length === 0) {
          console.log(chalk.green('✓ All templates are valid'));
        }
      }

      if (errors.length > 0 || unresolved > 0) {
        process.exit(1);
      }
    });
}
