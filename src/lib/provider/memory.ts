// Path: src/lib/provider/memory.ts
// In-memory secret provider for tests and offline runs

import { NotSignedInError, SecretNotFoundError } from '../../utils/error.js';
import type { SecretProvider, SecretWriteResult } from './types.js';

/** vault -> item -> field -> value */
export type MemoryVaults = Record<string, Record<string, Record<string, string>>>;

export interface MemorySecretProviderOptions {
  account?: string;
  accountAliases?: Record<string, string>;
  vaults?: MemoryVaults;
}

/**
 * Secret provider holding everything in a map. Counts calls so tests can
 * assert how often the "external" store was reached.
 */
export class MemorySecretProvider implements SecretProvider {
  readonly calls = { signIn: 0, fetch: 0, list: 0, write: 0 };
  /** Flip to false to simulate an expired session */
  signedIn = true;

  private readonly vaults = new Map<string, Map<string, Map<string, string>>>();
  private readonly aliases: Record<string, string>;
  private currentAccount: string | undefined;

  constructor(options: MemorySecretProviderOptions = {}) {
    this.aliases = options.accountAliases ?? {};
    this.currentAccount = options.account;
    for (const [vault, items] of Object.entries(options.vaults ?? {})) {
      for (const [identifier, fields] of Object.entries(items)) {
        for (const [field, value] of Object.entries(fields)) {
          this.setSecret(vault, identifier, field, value);
        }
      }
    }
  }

  get account(): string | undefined {
    return this.currentAccount;
  }

  setSecret(vault: string, identifier: string, field: string, value: string): void {
    let items = this.vaults.get(vault);
    if (!items) {
      items = new Map();
      this.vaults.set(vault, items);
    }
    let fields = items.get(identifier);
    if (!fields) {
      fields = new Map();
      items.set(identifier, fields);
    }
    fields.set(field, value);
  }

  async ensureSignedIn(accountAlias?: string): Promise<string | undefined> {
    this.calls.signIn++;
    const account = accountAlias !== undefined
      ? (Object.hasOwn(this.aliases, accountAlias) ? this.aliases[accountAlias] : accountAlias)
      : this.currentAccount;
    if (!this.signedIn) {
      throw new NotSignedInError(account);
    }
    this.currentAccount = account;
    return account;
  }

  async fetchSecret(identifier: string, field: string, vault: string): Promise<string> {
    this.calls.fetch++;
    this.assertSignedIn();
    const value = this.vaults.get(vault)?.get(identifier)?.get(field);
    if (value === undefined) {
      throw new SecretNotFoundError(identifier, vault);
    }
    return value;
  }

  async listSecrets(vault: string): Promise<string[]> {
    this.calls.list++;
    this.assertSignedIn();
    return Array.from(this.vaults.get(vault)?.keys() ?? []).sort();
  }

  async createOrUpdateSecret(
    identifier: string,
    value: string,
    vault: string,
    _category: string,
    field: string
  ): Promise<SecretWriteResult> {
    this.calls.write++;
    this.assertSignedIn();
    const existed = this.vaults.get(vault)?.has(identifier) ?? false;
    this.setSecret(vault, identifier, field, value);
    return existed ? 'updated' : 'created';
  }

  private assertSignedIn(): void {
    if (!this.signedIn) {
      throw new NotSignedInError(this.currentAccount);
    }
  }
}
