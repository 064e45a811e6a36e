// Path: src/lib/config/storage.ts
// Internal config storage management

import Conf from 'conf';
import path from 'node:path';
import type { InjectConfig } from './types.js';
import { DEFAULT_CONFIG } from './types.js';

/**
 * Explicit config directory (tests, dotfile repos). When unset, the
 * per-user Conf store is used.
 */
export function getConfigDir(): string | undefined {
  return process.env.SECRET_INJECT_CONFIG_DIR;
}

/**
 * Config file inside the explicit config directory
 */
export function getConfigFile(): string | undefined {
  const dir = getConfigDir();
  return dir ? path.join(dir, 'config.json') : undefined;
}

let store: Conf<InjectConfig> | null = null;

/**
 * User-level config store, created on first use so that runs with an
 * explicit config directory never touch the user's home.
 */
export function userConfig(): Conf<InjectConfig> {
  if (!store) {
    store = new Conf<InjectConfig>({
      projectName: 'secret-inject',
      defaults: DEFAULT_CONFIG,
    });
  }
  return store;
}
