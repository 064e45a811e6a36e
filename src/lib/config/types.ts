// Path: src/lib/config/types.ts
// Configuration type definitions

import { DEFAULT_CACHE_TTL_SECONDS } from '../cache.js';
import { DEFAULT_FIELD, DEFAULT_VAULT } from '../resolver.js';
import { DEFAULT_PROVIDER_TIMEOUT_MS } from '../provider/op-cli.js';
import { DEFAULT_TEMPLATE_EXTENSIONS } from '../../utils/path.js';

/**
 * Lookup cache settings
 */
export interface CacheConfig {
  /** Disable to always go to the secret store */
  enabled: boolean;
  /** Entry lifetime in seconds (0 = every read misses) */
  ttlSeconds: number;
  /** Cache directory (default: per-user dir under the system temp dir) */
  dir?: string;
}

/**
 * Secret store CLI settings
 */
export interface ProviderConfig {
  /** Binary name or path */
  command: string;
  /** Bound on a single CLI invocation */
  timeoutMs: number;
}

/**
 * Tool configuration
 */
export interface InjectConfig {
  /** Account alias table, e.g. { "work": "acme.1password.com" } */
  accounts: Record<string, string>;
  /** Alias or account id used when --account is not given */
  defaultAccount?: string;
  /** Accounts searched when the primary account has no such item */
  fallbackAccounts: string[];
  /** Vault for placeholders that do not name one */
  defaultVault: string;
  /** Field read when a placeholder does not name one */
  defaultField: string;
  cache: CacheConfig;
  provider: ProviderConfig;
  /** Extensions that mark template files and are stripped from output names */
  templateExtensions: string[];
}

export const DEFAULT_CONFIG: InjectConfig = {
  accounts: {},
  fallbackAccounts: [],
  defaultVault: DEFAULT_VAULT,
  defaultField: DEFAULT_FIELD,
  cache: {
    enabled: true,
    ttlSeconds: DEFAULT_CACHE_TTL_SECONDS,
  },
  provider: {
    command: 'op',
    timeoutMs: DEFAULT_PROVIDER_TIMEOUT_MS,
  },
  templateExtensions: [...DEFAULT_TEMPLATE_EXTENSIONS],
};
