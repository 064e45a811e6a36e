// Path: src/lib/context.ts
// Builds the config -> provider -> cache -> resolver chain for a command run

import { CacheManager, defaultCacheDir } from './cache.js';
import { loadConfig, type InjectConfig } from './config/index.js';
import { OpCliProvider } from './provider/op-cli.js';
import type { SecretProvider } from './provider/types.js';
import { SecretResolver } from './resolver.js';

export interface ContextOptions {
  /** Account alias or id; overrides the configured default */
  account?: string;
  /** Vault for placeholders that do not name one */
  vault?: string;
  /** false disables the cache for this run (commander's --no-cache) */
  cache?: boolean;
  /** TTL override in seconds */
  cacheTtl?: number;
  /** Verify the secret store session up front (default: true) */
  signIn?: boolean;
  /** Provider to use instead of the `op` CLI */
  provider?: SecretProvider;
  /** Preloaded configuration */
  config?: InjectConfig;
}

export interface InjectContext {
  config: InjectConfig;
  provider: SecretProvider;
  cache: CacheManager;
  resolver: SecretResolver;
}

/**
 * Cache manager for the loaded configuration, honouring per-run overrides.
 */
export function createCache(config: InjectConfig, options: Pick<ContextOptions, 'cache' | 'cacheTtl'> = {}): CacheManager {
  const cache = new CacheManager({
    dir: config.cache.dir ?? defaultCacheDir(),
    ttlSeconds: options.cacheTtl ?? config.cache.ttlSeconds,
    enabled: config.cache.enabled && options.cache !== false,
  });
  cache.init();
  return cache;
}

/**
 * @throws NotSignedInError when signIn is on and there is no session
 */
export async function createContext(options: ContextOptions = {}): Promise<InjectContext> {
  const config = options.config ?? loadConfig();
  const provider = options.provider ?? new OpCliProvider({
    command: config.provider.command,
    account: options.account ?? config.defaultAccount,
    accountAliases: config.accounts,
    fallbackAccounts: config.fallbackAccounts,
    timeoutMs: config.provider.timeoutMs,
  });

  if (options.signIn ?? true) {
    await provider.ensureSignedIn();
  }

  const cache = createCache(config, options);
  const resolver = new SecretResolver(provider, cache, {
    vault: options.vault ?? config.defaultVault,
    field: config.defaultField,
  });

  return { config, provider, cache, resolver };
}
