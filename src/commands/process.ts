// Path: src/commands/process.ts
// Template processing command

import type { Command } from 'commander';
import ora from 'ora';
import chalk from 'chalk';
import fs from 'node:fs';
import { createContext, type InjectContext } from '../lib/context.js';
import {
  STDOUT_TARGET,
  TemplateProcessor,
  collectTemplates,
  type FileProcessOptions,
  type FileSkipped,
  type ProcessingResult,
} from '../lib/processor.js';
import { TEMPLATE_FORMATS, parseFormat, type TemplateFormat } from '../lib/template/index.js';
import { contextOptions, exitWithError, parseSeconds, readStdin } from './common.js';
import type { ProcessCommandOptions } from './types.js';

/**
 * Expand directories (with --recursive) into template files
 */
function expandPaths(paths: string[], recursive: boolean, force: boolean, extensions: readonly string[]): string[] {
  const files: string[] = [];
  for (const entry of paths) {
    const stat = fs.statSync(entry, { throwIfNoEntry: false });
    if (stat?.isDirectory()) {
      if (!recursive) {
        throw new Error(`${entry} is a directory (use --recursive)`);
      }
      files.push(...collectTemplates(entry, extensions, force));
    } else {
      // Missing files are reported per file by the processor
      files.push(entry);
    }
  }
  return files;
}

const SKIP_REASONS: Record<FileSkipped['reason'], string> = {
  'not-a-template': 'no template extension, use --force to process it',
  'not-signed-in': 'not signed in to the secret store',
};

function printWarnings(file: string, result: ProcessingResult): void {
  for (const warning of result.warnings) {
    console.error(chalk.yellow(`⚠ ${file}: ${warning}`));
  }
}

export function registerProcessCommand(program: Command): void {
  program
    .command('process')
    .description('Replace secret placeholders in templates with values from the secret store')
    .argument('[paths...]', 'Template files, or directories with --recursive')
    .option('-o, --output <path>', 'Output path, or "-" for stdout (single input only)')
    .option('-f, --format <format>', `Placeholder format: auto, ${TEMPLATE_FORMATS.join(', ')}`, 'auto')
    .option('--vault <vault>', 'Vault for placeholders that do not name one')
    .option('--account <account>', 'Account alias or id')
    .option('-n, --dry-run', 'Preview without writing (values are masked)')
    .option('--debug', 'Trace each lookup on stderr; dry-run previews show values')
    .option('--allow-missing', 'Leave unresolved placeholders in place instead of failing')
    .option('-r, --recursive', 'Process template files under directories')
    .option('-b, --backup', 'Keep a .backup copy of files that are replaced')
    .option('--force', 'Also process files without a template extension')
    .option('--stdin', 'Read the template from stdin')
    .option('--no-cache', 'Bypass the lookup cache')
    .option('--cache-ttl <seconds>', 'Cache lifetime for this run', parseSeconds)
    .option('--warm-cache', 'Cache every item in the vault before processing')
    .addHelpText('after', `
Examples:
  secret-inject process .env.template                 # writes .env
  secret-inject process config.yml.tmpl -o -          # print to stdout
  secret-inject process -r ./deploy --allow-missing   # every template under ./deploy
  secret-inject process app.conf.tpl --dry-run        # preview with masked values
  cat app.env.tpl | secret-inject process --stdin > app.env
`)
    .action(async (paths: string[], options: ProcessCommandOptions) => {
      let format: TemplateFormat | 'auto';
      try {
        format = parseFormat(options.format);
      } catch (err) {
        exitWithError(err);
      }

      if (options.stdin && paths.length > 0) {
        console.error(chalk.red('--stdin cannot be combined with template paths'));
        process.exit(1);
      }
      if (!options.stdin && paths.length === 0) {
        console.error(chalk.red('No templates given. Pass template paths or use --stdin.'));
        process.exit(1);
      }

      let ctx: InjectContext;
      try {
        ctx = await createContext(contextOptions(options));
      } catch (err) {
        exitWithError(err);
      }

      if (options.warmCache) {
        const spinner = ora(`Caching items from vault ${ctx.resolver.defaultVault}...`).start();
        try {
          const warmed = await ctx.resolver.warmCache();
          if (warmed.failed.length > 0) {
            spinner.warn(`Cached ${warmed.warmed.length} item(s), ${warmed.failed.length} failed`);
          } else {
            spinner.succeed(`Cached ${warmed.warmed.length} item(s)`);
          }
        } catch (err) {
          exitWithError(err, spinner, 'Cache warm-up failed');
        }
      }

      const processor = new TemplateProcessor(ctx.resolver);
      const fileOptions: FileProcessOptions = {
        format,
        vault: options.vault,
        allowMissing: options.allowMissing,
        debug: options.debug,
        useCache: options.cache !== false,
        output: options.output,
        dryRun: options.dryRun,
        backup: options.backup,
        templateExtensions: ctx.config.templateExtensions,
        force: options.force,
      };

      if (options.stdin) {
        try {
          const result = await processor.processStream(await readStdin(), fileOptions);
          printWarnings('stdin', result);
          if (result.output && result.output !== STDOUT_TARGET) {
            console.error(chalk.green('✓') + ` stdin -> ${result.output}`);
          }
        } catch (err) {
          exitWithError(err);
        }
        return;
      }

      let files: string[];
      try {
        files = expandPaths(paths, options.recursive ?? false, options.force ?? false, ctx.config.templateExtensions);
      } catch (err) {
        exitWithError(err);
      }

      if (files.length === 0) {
        console.error(chalk.yellow('No template files found'));
        return;
      }
      if (options.output && files.length > 1) {
        console.error(chalk.red('--output takes a single template'));
        process.exit(1);
      }

      const summary = await processor.processFiles(files, fileOptions);
      const quiet = options.dryRun || options.output === STDOUT_TARGET;

      for (const { file, result } of summary.succeeded) {
        printWarnings(file, result);
        if (!quiet) {
          const target = result.output ? ` -> ${result.output}` : chalk.gray(' (unchanged)');
          console.error(chalk.green('✓') + ` ${file}${target}`);
        }
      }
      for (const { file, error } of summary.failed) {
        console.error(chalk.red('✗') + ` ${file}: ${error.message}`);
      }
      for (const { file, reason } of summary.skipped) {
        console.error(chalk.gray(`- ${file}: skipped (${SKIP_REASONS[reason]})`));
      }

      if (files.length > 1 || summary.failed.length > 0 || summary.skipped.length > 0) {
        console.error();
        console.error(
          `Processed: ${summary.succeeded.length} succeeded, ${summary.failed.length} failed, ` +
          `${summary.skipped.length} skipped`
        );
      }
      if (summary.failed.length > 0) {
        process.exit(1);
      }
    });
}
