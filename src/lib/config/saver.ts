// Path: src/lib/config/saver.ts
// Configuration saving and modification

import fs from 'node:fs';
import { configLogger as log } from '../logger.js';
import type { InjectConfig } from './types.js';
import { getConfigDir, getConfigFile, userConfig } from './storage.js';
import { loadStoredConfig } from './loader.js';

/**
 * Save configuration
 */
export function saveConfig(config: InjectConfig): void {
  const configDir = getConfigDir();
  const configFile = getConfigFile();

  if (configDir && configFile) {
    if (!fs.existsSync(configDir)) {
      fs.mkdirSync(configDir, { recursive: true, mode: 0o700 });
    }
    fs.writeFileSync(configFile, JSON.stringify(config, null, 2) + '\n', { mode: 0o600 });
    log.debug({ path: configFile }, 'Config saved (config dir)');
    return;
  }

  userConfig().store = config;
  log.debug({ path: userConfig().path }, 'Config saved (user config)');
}

/**
 * Map an account alias (e.g. "work") to a backend account id
 */
export function setAccountAlias(alias: string, account: string): void {
  const config = loadStoredConfig();
  config.accounts = { ...config.accounts, [alias]: account };
  saveConfig(config);
}

/**
 * Remove an account alias
 * @returns true if the alias existed
 */
export function removeAccountAlias(alias: string): boolean {
  const config = loadStoredConfig();
  if (!Object.hasOwn(config.accounts, alias)) {
    return false;
  }
  const { [alias]: _removed, ...rest } = config.accounts;
  config.accounts = rest;
  saveConfig(config);
  return true;
}
