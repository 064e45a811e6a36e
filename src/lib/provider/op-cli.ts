// Path: src/lib/provider/op-cli.ts
// 1Password CLI (`op`) adapter

import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { providerLogger as log } from '../logger.js';
import {
  NotSignedInError,
  ProviderError,
  SecretNotFoundError,
  isNotFoundMessage,
  isSignInMessage,
} from '../../utils/error.js';
import type {
  CommandResult,
  CommandRunner,
  SecretProvider,
  SecretWriteResult,
  SecretSummary,
} from './types.js';

const execFileAsync = promisify(execFile);

/** Default bound on a single `op` invocation */
export const DEFAULT_PROVIDER_TIMEOUT_MS = 15_000;

/**
 * Run a command with execFile (no shell). Non-zero exits and timeouts are
 * returned as results; only a failure to spawn is thrown.
 */
export const execFileRunner: CommandRunner = async (command, args, { timeoutMs }) => {
  try {
    const { stdout, stderr } = await execFileAsync(command, [...args], {
      timeout: timeoutMs,
      maxBuffer: 10 * 1024 * 1024,
      encoding: 'utf8',
    });
    return { stdout, stderr, exitCode: 0, timedOut: false };
  } catch (err) {
    if (!(err instanceof Error)) {
      throw err;
    }
    if ('code' in err && err.code === 'ENOENT') {
      throw new ProviderError(`Secret store CLI not found on PATH: ${command}`, undefined, err);
    }
    const stdout = 'stdout' in err && typeof err.stdout === 'string' ? err.stdout : '';
    const stderr = 'stderr' in err && typeof err.stderr === 'string' ? err.stderr : err.message;
    const exitCode = 'code' in err && typeof err.code === 'number' ? err.code : 1;
    const timedOut = 'killed' in err && err.killed === true;
    return { stdout, stderr, exitCode, timedOut };
  }
};

export interface OpCliProviderOptions {
  /** Binary name or path (default: op) */
  command?: string;
  /** Account alias or id used when no alias is passed to ensureSignedIn */
  account?: string;
  /** Alias table, e.g. { work: 'acme.1password.com' } */
  accountAliases?: Record<string, string>;
  /** Accounts tried, in order, when the primary account has no such item */
  fallbackAccounts?: string[];
  /** Bound on each invocation (default: 15s) */
  timeoutMs?: number;
  /** Command runner (default: execFile) */
  runner?: CommandRunner;
}

function firstLine(text: string): string {
  return text.trim().split('\n')[0] ?? '';
}

function isSummary(value: unknown): value is SecretSummary {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  return 'id' in value && typeof value.id === 'string' &&
         'title' in value && typeof value.title === 'string';
}

/**
 * Secret provider backed by the `op` command-line tool.
 *
 * CLI contract:
 * - `op account get` exits non-zero when there is no session
 * - `op item get NAME --fields FIELD --reveal` prints the raw value
 * - `op item list --format json` prints an array of item summaries
 * - failures exit non-zero with a message on stderr
 */
export class OpCliProvider implements SecretProvider {
  private readonly command: string;
  private readonly aliases: Record<string, string>;
  private readonly fallbackAccounts: string[];
  private readonly timeoutMs: number;
  private readonly runner: CommandRunner;
  private currentAccount: string | undefined;

  constructor(options: OpCliProviderOptions = {}) {
    this.command = options.command ?? 'op';
    this.aliases = options.accountAliases ?? {};
    this.fallbackAccounts = options.fallbackAccounts ?? [];
    this.timeoutMs = options.timeoutMs ?? DEFAULT_PROVIDER_TIMEOUT_MS;
    this.runner = options.runner ?? execFileRunner;
    this.currentAccount = this.resolveAccount(options.account);
  }

  get account(): string | undefined {
    return this.currentAccount;
  }

  /**
   * Map an alias to a backend account id; unknown names pass through.
   */
  resolveAccount(aliasOrId?: string): string | undefined {
    if (!aliasOrId) {
      return undefined;
    }
    return Object.hasOwn(this.aliases, aliasOrId) ? this.aliases[aliasOrId] : aliasOrId;
  }

  async ensureSignedIn(accountAlias?: string): Promise<string | undefined> {
    const account = accountAlias !== undefined ? this.resolveAccount(accountAlias) : this.currentAccount;
    const result = await this.run(['account', 'get', ...this.accountArgs(account)]);

    if (result.timedOut) {
      throw new NotSignedInError(account, `no response within ${this.timeoutMs}ms, re-authentication may be pending`);
    }
    if (result.exitCode !== 0) {
      throw new NotSignedInError(account, firstLine(result.stderr) || undefined);
    }

    this.currentAccount = account;
    log.debug({ account }, 'Secret store session verified');
    return account;
  }

  async fetchSecret(identifier: string, field: string, vault: string): Promise<string> {
    try {
      return await this.fetchFrom(identifier, field, vault, this.currentAccount);
    } catch (err) {
      if (!(err instanceof SecretNotFoundError)) {
        throw err;
      }
    }

    for (const fallback of this.fallbackAccounts) {
      const account = this.resolveAccount(fallback);
      if (account === this.currentAccount) {
        continue;
      }
      try {
        const value = await this.fetchFrom(identifier, field, vault, account);
        log.debug({ identifier, vault, account }, 'Secret found in fallback account');
        return value;
      } catch (err) {
        log.debug({ identifier, vault, account, code: err instanceof Error ? err.name : 'unknown' }, 'Fallback account lookup failed');
      }
    }

    throw new SecretNotFoundError(identifier, vault);
  }

  async listSecrets(vault: string): Promise<string[]> {
    const result = await this.run(['item', 'list', '--vault', vault, '--format', 'json', ...this.accountArgs(this.currentAccount)]);
    this.assertSuccess(result, this.currentAccount, `vault ${vault}`);

    let parsed: unknown;
    try {
      parsed = JSON.parse(result.stdout);
    } catch (err) {
      throw new ProviderError(`Unparseable item list for vault ${vault}`, result.exitCode, err instanceof Error ? err : undefined);
    }
    if (!Array.isArray(parsed)) {
      throw new ProviderError(`Unexpected item list for vault ${vault}: not an array`);
    }

    return parsed.filter(isSummary).map((item) => item.title).sort();
  }

  async createOrUpdateSecret(
    identifier: string,
    value: string,
    vault: string,
    category: string,
    field: string
  ): Promise<SecretWriteResult> {
    await this.ensureSignedIn();
    const accountArgs = this.accountArgs(this.currentAccount);

    const existing = await this.run(['item', 'get', identifier, '--vault', vault, ...accountArgs]);
    if (existing.exitCode === 0) {
      const result = await this.run(['item', 'edit', identifier, '--vault', vault, `${field}=${value}`, ...accountArgs]);
      this.assertSuccess(result, this.currentAccount, identifier);
      log.info({ identifier, vault }, 'Updated secret');
      return 'updated';
    }
    if (!isNotFoundMessage(existing.stderr)) {
      this.assertSuccess(existing, this.currentAccount, identifier);
    }

    const result = await this.run([
      'item', 'create',
      '--category', category,
      '--title', identifier,
      '--vault', vault,
      `${field}=${value}`,
      ...accountArgs,
    ]);
    this.assertSuccess(result, this.currentAccount, identifier);
    log.info({ identifier, vault }, 'Created secret');
    return 'created';
  }

  private async fetchFrom(
    identifier: string,
    field: string,
    vault: string,
    account: string | undefined
  ): Promise<string> {
    const result = await this.run([
      'item', 'get', identifier,
      '--vault', vault,
      '--fields', field,
      '--reveal',
      ...this.accountArgs(account),
    ]);
    this.assertSuccess(result, account, identifier, vault);

    const value = result.stdout.replace(/\r?\n$/, '');
    if (value === '') {
      throw new SecretNotFoundError(identifier, vault);
    }
    return value;
  }

  private accountArgs(account: string | undefined): string[] {
    return account ? ['--account', account] : [];
  }

  private async run(args: string[]): Promise<CommandResult> {
    log.trace({ command: this.command, subcommand: args.slice(0, 2).join(' ') }, 'Running secret store CLI');
    return this.runner(this.command, args, { timeoutMs: this.timeoutMs });
  }

  /**
   * Map a failed invocation onto the error taxonomy. stderr is matched, never
   * echoed with arguments, so values passed on the command line stay out of
   * error messages.
   */
  private assertSuccess(
    result: CommandResult,
    account: string | undefined,
    subject: string,
    vault?: string
  ): void {
    if (result.timedOut) {
      throw new NotSignedInError(account, `no response within ${this.timeoutMs}ms, re-authentication may be pending`);
    }
    if (result.exitCode === 0) {
      return;
    }
    if (isSignInMessage(result.stderr)) {
      throw new NotSignedInError(account, firstLine(result.stderr));
    }
    if (isNotFoundMessage(result.stderr)) {
      throw new SecretNotFoundError(subject, vault);
    }
    throw new ProviderError(
      `Secret store command failed for ${subject} (exit ${result.exitCode}): ${firstLine(result.stderr)}`,
      result.exitCode
    );
  }
}
