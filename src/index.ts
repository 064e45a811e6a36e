#!/usr/bin/env node

import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { setLogLevel } from './lib/logger.js';
import { registerProcessCommand } from './commands/process.js';
import { registerValidateCommand } from './commands/validate.js';
import { registerDiffCommand } from './commands/diff.js';
import { registerCacheCommands } from './commands/cache.js';
import { registerSecretCommands } from './commands/secret.js';
import { registerConfigCommands } from './commands/config.js';

// Read version from package.json at runtime
function getVersion(): string {
  try {
    const __dirname = dirname(fileURLToPath(import.meta.url));
    // dist/../package.json, or src/../package.json when run from source
    const pkgPath = join(__dirname, '..', 'package.json');
    const pkg = JSON.parse(readFileSync(pkgPath, 'utf-8')) as { version?: string };
    return pkg.version ?? '0.0.0';
  } catch {
    return '0.0.0';
  }
}
const version = getVersion();

const program = new Command();

program
  .name('secret-inject')
  .description('Fill configuration templates with secrets from a password manager CLI')
  .version(version)
  .option('--verbose', 'Debug logging on stderr')
  .hook('preAction', (thisCommand) => {
    if (thisCommand.opts<{ verbose?: boolean }>().verbose) {
      setLogLevel('debug');
    }
  });

// Register commands
registerProcessCommand(program);
registerValidateCommand(program);
registerDiffCommand(program);
registerCacheCommands(program);
registerSecretCommands(program);
registerConfigCommands(program);

// Parse arguments
await program.parseAsync();
