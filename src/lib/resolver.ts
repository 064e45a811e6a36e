// Path: src/lib/resolver.ts
// Identifier -> value resolution through cache and secret store

import { resolverLogger as log } from './logger.js';
import type { CacheManager } from './cache.js';
import type { SecretProvider, SecretRecord } from './provider/types.js';
import { splitFieldSpec } from './template/extractor.js';
import { NotSignedInError, extractErrorMessage } from '../utils/error.js';

/** Operation name used in cache keys for field lookups */
const SECRET_OPERATION = 'secret';

export const DEFAULT_VAULT = 'Employee';
export const DEFAULT_FIELD = 'credential';

export interface ResolverDefaults {
  vault: string;
  field: string;
}

export interface ResolveOptions {
  field?: string;
  vault?: string;
  /** Set false to bypass the cache for both read and write */
  useCache?: boolean;
  /** The identifier is an item name as-is; a colon in it is not a field separator */
  literal?: boolean;
}

/**
 * A resolved record annotated with where the value came from
 */
export interface ResolvedSecret extends SecretRecord {
  source: 'cache' | 'provider';
}

/**
 * Per-identifier outcome of a batch lookup
 */
export type ResolveOutcome =
  | { ok: true; value: string; field: string }
  | { ok: false; error: Error; field: string };

export interface WarmCacheResult {
  vault: string;
  warmed: string[];
  failed: string[];
}

/**
 * Resolves secret identifiers against a provider, with a write-through cache.
 */
export class SecretResolver {
  private readonly defaults: ResolverDefaults;

  constructor(
    private readonly provider: SecretProvider,
    private readonly cache: CacheManager,
    defaults: Partial<ResolverDefaults> = {}
  ) {
    this.defaults = {
      vault: defaults.vault ?? DEFAULT_VAULT,
      field: defaults.field ?? DEFAULT_FIELD,
    };
  }

  get defaultVault(): string {
    return this.defaults.vault;
  }

  get defaultField(): string {
    return this.defaults.field;
  }

  /**
   * Resolve an identifier to its value.
   * `identifier` may carry an inline field ("GITHUB_TOKEN:password").
   *
   * @throws SecretNotFoundError, NotSignedInError or ProviderError from the provider
   */
  async resolve(identifier: string, options: ResolveOptions = {}): Promise<string> {
    const record = await this.resolveDetailed(identifier, options);
    return record.value;
  }

  /**
   * Like resolve(), also reporting vault, field, account and cache/provider source.
   */
  async resolveDetailed(identifier: string, options: ResolveOptions = {}): Promise<ResolvedSecret> {
    const spec: { identifier: string; field?: string } = options.literal ? { identifier } : splitFieldSpec(identifier);
    const field = spec.field ?? options.field ?? this.defaults.field;
    const vault = options.vault ?? this.defaults.vault;
    const account = this.provider.account;
    const keyArgs = [spec.identifier, field, vault, account ?? ''];
    const useCache = options.useCache ?? true;

    if (useCache) {
      const cached = this.cache.get(SECRET_OPERATION, ...keyArgs);
      if (cached !== undefined) {
        log.debug({ identifier: spec.identifier, field, vault }, 'Cache hit');
        return { identifier: spec.identifier, value: cached, vault, account, field, source: 'cache' };
      }
    }

    const value = await this.provider.fetchSecret(spec.identifier, field, vault);
    if (useCache) {
      this.cache.set(value, SECRET_OPERATION, ...keyArgs);
    }
    log.debug({ identifier: spec.identifier, field, vault }, 'Fetched from secret store');
    return { identifier: spec.identifier, value, vault, account, field, source: 'provider' };
  }

  /**
   * Resolve, substituting `defaultValue` on any failure.
   */
  async getOrDefault(identifier: string, defaultValue: string, options: ResolveOptions = {}): Promise<string> {
    try {
      return await this.resolve(identifier, options);
    } catch (err) {
      log.debug({ identifier, reason: extractErrorMessage(err) }, 'Using default value');
      return defaultValue;
    }
  }

  /**
   * Whether the identifier resolves in the vault (default field).
   */
  async exists(identifier: string, vault?: string): Promise<boolean> {
    try {
      await this.resolve(identifier, { vault });
      return true;
    } catch (err) {
      log.debug({ identifier, vault, reason: extractErrorMessage(err) }, 'Secret does not resolve');
      return false;
    }
  }

  /**
   * Resolve "NAME" or "NAME:field" specs, continuing past failures.
   * Each identifier maps to its own outcome so callers can tell partial from
   * total failure.
   */
  async batchResolve(vault: string, specs: readonly string[]): Promise<Map<string, ResolveOutcome>> {
    const results = new Map<string, ResolveOutcome>();

    for (const raw of specs) {
      const spec = splitFieldSpec(raw);
      results.set(spec.identifier, await this.outcome(spec.identifier, spec.field ?? this.defaults.field, vault));
    }

    return results;
  }

  /**
   * Resolve and cache every item in a vault ahead of bulk processing.
   * Item titles are looked up as-is with the default field.
   *
   * @throws NotSignedInError when the session ends part way
   */
  async warmCache(vault?: string): Promise<WarmCacheResult> {
    const target = vault ?? this.defaults.vault;
    const identifiers = await this.provider.listSecrets(target);

    const result: WarmCacheResult = { vault: target, warmed: [], failed: [] };
    for (const identifier of identifiers) {
      const outcome = await this.outcome(identifier, this.defaults.field, target);
      if (!outcome.ok && outcome.error instanceof NotSignedInError) {
        throw outcome.error;
      }
      (outcome.ok ? result.warmed : result.failed).push(identifier);
    }

    log.info({ vault: target, warmed: result.warmed.length, failed: result.failed.length }, 'Cache warmed');
    return result;
  }

  private async outcome(identifier: string, field: string, vault: string): Promise<ResolveOutcome> {
    try {
      const value = await this.resolve(identifier, { vault, field, literal: true });
      return { ok: true, value, field };
    } catch (err) {
      const error = err instanceof Error ? err : new Error(extractErrorMessage(err));
      log.debug({ identifier, vault, reason: error.message }, 'Batch entry failed');
      return { ok: false, error, field };
    }
  }
}

/**
 * Lenient view of a batch: successful values only.
 */
export function successfulValues(outcomes: ReadonlyMap<string, ResolveOutcome>): Map<string, string> {
  const values = new Map<string, string>();
  for (const [identifier, outcome] of outcomes) {
    if (outcome.ok) {
      values.set(identifier, outcome.value);
    }
  }
  return values;
}
