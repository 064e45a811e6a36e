// Path: src/lib/provider/index.ts
// Public API for secret store adapters

export type {
  SecretProvider,
  SecretRecord,
  SecretSummary,
  SecretWriteResult,
  CommandResult,
  CommandRunner,
} from './types.js';

export { OpCliProvider, execFileRunner, DEFAULT_PROVIDER_TIMEOUT_MS, type OpCliProviderOptions } from './op-cli.js';
export { MemorySecretProvider, type MemorySecretProviderOptions, type MemoryVaults } from './memory.js';
