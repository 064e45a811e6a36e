// Path: src/commands/diff.ts
// Preview of the changes processing would make

import type { Command } from 'commander';
import chalk from 'chalk';
import { createContext, type InjectContext } from '../lib/context.js';
import { diffTemplate } from '../lib/inspect.js';
import { TEMPLATE_FORMATS, parseFormat, type TemplateFormat } from '../lib/template/index.js';
import { extractErrorMessage } from '../utils/error.js';
import { contextOptions, exitWithError } from './common.js';
import type { DiffCommandOptions } from './types.js';

/**
 * Colour unified diff lines for a terminal
 */
export function colorizePatch(patch: string): string {
  return patch
    .split('\n')
    .map((line) => {
      if (line.startsWith('+++') || line.startsWith('---')) return chalk.bold(line);
      if (line.startsWith('@@')) return chalk.cyan(line);
      if (line.startsWith('+')) return chalk.green(line);
      if (line.startsWith('-')) return chalk.red(line);
      return line;
    })
    .join('\n');
}

export function registerDiffCommand(program: Command): void {
  program
    .command('diff')
    .description('Show what processing would change, without writing (values are shown)')
    .argument('<paths...>', 'Template files')
    .option('-f, --format <format>', `Placeholder format: auto, ${TEMPLATE_FORMATS.join(', ')}`, 'auto')
    .option('--vault <vault>', 'Vault for placeholders that do not name one')
    .option('--account <account>', 'Account alias or id')
    .option('--no-color', 'Plain diff output')
    .action(async (paths: string[], options: DiffCommandOptions) => {
      let format: TemplateFormat | 'auto';
      try {
        format = parseFormat(options.format);
      } catch (err) {
        exitWithError(err);
      }

      let ctx: InjectContext;
      try {
        ctx = await createContext(contextOptions(options));
      } catch (err) {
        exitWithError(err);
      }

      let failed = 0;
      for (const file of paths) {
        try {
          const patch = await diffTemplate(file, ctx.resolver, { format, vault: options.vault });
          process.stdout.write(options.color === false ? patch : colorizePatch(patch));
        } catch (err) {
          failed++;
          console.error(chalk.red('✗') + ` ${file}: ${extractErrorMessage(err)}`);
        }
      }

      if (failed > 0) {
        process.exit(1);
      }
    });
}
