// Path: src/lib/config/index.ts
// Public API for configuration module

export type { InjectConfig, CacheConfig, ProviderConfig } from './types.js';
export { DEFAULT_CONFIG } from './types.js';

export { loadConfig, loadStoredConfig, getConfigPath, withDefaults } from './loader.js';
export { saveConfig, setAccountAlias, removeAccountAlias } from './saver.js';
