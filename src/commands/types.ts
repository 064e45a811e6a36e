// Path: src/commands/types.ts
// Type definitions for Commander.js command options

/**
 * Options shared by commands that talk to the secret store
 */
export interface StoreCommandOptions {
  vault?: string;
  account?: string;
  /** false when --no-cache is given */
  cache?: boolean;
  cacheTtl?: number;
}

/**
 * Options for the 'process' command
 */
export interface ProcessCommandOptions extends StoreCommandOptions {
  output?: string;
  format: string;
  dryRun?: boolean;
  debug?: boolean;
  allowMissing?: boolean;
  recursive?: boolean;
  backup?: boolean;
  force?: boolean;
  stdin?: boolean;
  warmCache?: boolean;
}

/**
 * Options for the 'validate' command
 */
export interface ValidateCommandOptions extends StoreCommandOptions {
  format: string;
  /** false when --no-check is given */
  check?: boolean;
  json?: boolean;
}

/**
 * Options for the 'diff' command
 */
export interface DiffCommandOptions extends StoreCommandOptions {
  format: string;
  /** false when --no-color is given */
  color?: boolean;
}

/**
 * Options for the 'warm-cache' command
 */
export interface WarmCacheCommandOptions extends StoreCommandOptions {
  json?: boolean;
}

/**
 * Options for the 'clear-cache' command
 */
export interface ClearCacheCommandOptions {
  expired?: boolean;
}

/**
 * Options for 'secret get'
 */
export interface SecretGetCommandOptions extends StoreCommandOptions {
  field?: string;
  default?: string;
}

/**
 * Options for 'secret set'
 */
export interface SecretSetCommandOptions {
  vault?: string;
  account?: string;
  field?: string;
  category: string;
}

/**
 * Options for 'secret list'
 */
export interface SecretListCommandOptions {
  vault?: string;
  account?: string;
  json?: boolean;
}

/**
 * Options for 'config show'
 */
export interface ConfigShowCommandOptions {
  json?: boolean;
}
