// Path: src/lib/config/loader.ts
// Configuration loading and retrieval

import fs from 'node:fs';
import { configLogger as log } from '../logger.js';
import type { InjectConfig } from './types.js';
import { DEFAULT_CONFIG } from './types.js';
import { getConfigFile, userConfig } from './storage.js';

/**
 * Fill missing fields from defaults; nested sections merge key by key.
 */
export function withDefaults(partial: Partial<InjectConfig>): InjectConfig {
  return {
    ...DEFAULT_CONFIG,
    ...partial,
    accounts: { ...DEFAULT_CONFIG.accounts, ...partial.accounts },
    fallbackAccounts: partial.fallbackAccounts ?? [...DEFAULT_CONFIG.fallbackAccounts],
    cache: { ...DEFAULT_CONFIG.cache, ...partial.cache },
    provider: { ...DEFAULT_CONFIG.provider, ...partial.provider },
    templateExtensions: partial.templateExtensions ?? [...DEFAULT_CONFIG.templateExtensions],
  };
}

function readNumber(name: string): number | undefined {
  const raw = process.env[name];
  if (raw === undefined || raw === '') {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    log.warn({ variable: name }, 'Ignoring non-numeric environment override');
    return undefined;
  }
  return value;
}

/**
 * Load the stored configuration without environment overrides. Commands that
 * edit and save the configuration start from this.
 */
export function loadStoredConfig(): InjectConfig {
  const configFile = getConfigFile();
  if (!configFile) {
    log.debug({ path: userConfig().path }, 'Loaded user config');
    return withDefaults(userConfig().store);
  }

  if (!fs.existsSync(configFile)) {
    // Explicit dir without a file yet; never fall back to the user store
    return withDefaults({});
  }

  try {
    const parsed = JSON.parse(fs.readFileSync(configFile, 'utf-8')) as Partial<InjectConfig>;
    log.debug({ path: configFile }, 'Loaded config file');
    return withDefaults(parsed);
  } catch (err) {
    log.error({ err, path: configFile }, 'Failed to load config file, using defaults');
    return withDefaults({});
  }
}

/**
 * Load the effective configuration: the stored configuration with
 * environment variable overrides.
 *
 * Environment variables:
 * - SECRET_INJECT_ACCOUNT: account alias or id
 * - SECRET_INJECT_VAULT: default vault
 * - SECRET_INJECT_CACHE_TTL: cache TTL in seconds
 * - SECRET_INJECT_CACHE_ENABLED: "false" disables the cache
 * - SECRET_INJECT_CACHE_DIR: cache directory
 * - SECRET_INJECT_PROVIDER_TIMEOUT_MS: bound on each secret store call
 */
export function loadConfig(): InjectConfig {
  const config = loadStoredConfig();

  if (process.env.SECRET_INJECT_ACCOUNT) {
    config.defaultAccount = process.env.SECRET_INJECT_ACCOUNT;
  }
  if (process.env.SECRET_INJECT_VAULT) {
    config.defaultVault = process.env.SECRET_INJECT_VAULT;
  }
  const ttl = readNumber('SECRET_INJECT_CACHE_TTL');
  if (ttl !== undefined) {
    config.cache.ttlSeconds = ttl;
  }
  if (process.env.SECRET_INJECT_CACHE_ENABLED !== undefined) {
    config.cache.enabled = process.env.SECRET_INJECT_CACHE_ENABLED !== 'false';
  }
  if (process.env.SECRET_INJECT_CACHE_DIR) {
    config.cache.dir = process.env.SECRET_INJECT_CACHE_DIR;
  }
  const timeout = readNumber('SECRET_INJECT_PROVIDER_TIMEOUT_MS');
  if (timeout !== undefined) {
    config.provider.timeoutMs = timeout;
  }

  return config;
}

/**
 * Get config file path for display
 */
export function getConfigPath(): string {
  return getConfigFile() ?? userConfig().path;
}
