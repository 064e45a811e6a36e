// Path: src/lib/validation.ts
// Configuration validation for secret-inject

import path from 'node:path';
import type { InjectConfig } from './config/index.js';

export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
  warnings: ValidationWarning[];
}

export interface ValidationError {
  field: string;
  message: string;
  value?: unknown;
}

export interface ValidationWarning {
  field: string;
  message: string;
  suggestion?: string;
}

/**
 * Validate a loaded configuration
 */
export function validateConfig(config: InjectConfig): ValidationResult {
  const errors: ValidationError[] = [];
  const warnings: ValidationWarning[] = [];

  if (!config.defaultVault) {
    errors.push({ field: 'defaultVault', message: 'Default vault is required' });
  }
  if (!config.defaultField) {
    errors.push({ field: 'defaultField', message: 'Default field is required' });
  }

  for (const [alias, account] of Object.entries(config.accounts)) {
    if (!account) {
      errors.push({ field: `accounts.${alias}`, message: 'Alias must map to an account id', value: account });
    }
  }

  if (config.defaultAccount && config.accounts[config.defaultAccount] === undefined && !config.defaultAccount.includes('.')) {
    warnings.push({
      field: 'defaultAccount',
      message: `"${config.defaultAccount}" is neither a configured alias nor an account domain`,
      suggestion: `secret-inject config set-alias ${config.defaultAccount} <account-id>`,
    });
  }

  // Cache
  if (!Number.isFinite(config.cache.ttlSeconds) || config.cache.ttlSeconds < 0) {
    errors.push({ field: 'cache.ttlSeconds', message: 'TTL must be a non-negative number of seconds', value: config.cache.ttlSeconds });
  } else if (config.cache.enabled && config.cache.ttlSeconds === 0) {
    warnings.push({
      field: 'cache.ttlSeconds',
      message: 'TTL of 0 makes every cache read miss',
      suggestion: 'Disable the cache instead, or use a positive TTL',
    });
  } else if (config.cache.ttlSeconds > 3600) {
    warnings.push({
      field: 'cache.ttlSeconds',
      message: 'Secrets stay on disk for more than an hour',
      suggestion: 'Use a TTL of 300 seconds or less',
    });
  }
  if (config.cache.dir && !path.isAbsolute(config.cache.dir)) {
    errors.push({ field: 'cache.dir', message: 'Cache directory must be an absolute path', value: config.cache.dir });
  }

  // Provider
  if (!config.provider.command) {
    errors.push({ field: 'provider.command', message: 'Secret store command is required' });
  }
  if (!Number.isFinite(config.provider.timeoutMs) || config.provider.timeoutMs <= 0) {
    errors.push({ field: 'provider.timeoutMs', message: 'Timeout must be a positive number of milliseconds', value: config.provider.timeoutMs });
  }

  // Templates
  if (config.templateExtensions.length === 0) {
    warnings.push({
      field: 'templateExtensions',
      message: 'No template extensions configured; recursive processing will find nothing',
    });
  }
  for (const ext of config.templateExtensions) {
    if (!ext.startsWith('.')) {
      errors.push({ field: 'templateExtensions', message: 'Extensions must start with a dot', value: ext });
    }
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}

/**
 * Format validation result for display
 */
export function formatValidationResult(result: ValidationResult): string {
  const lines: string[] = [];

  if (result.errors.length > 0) {
    lines.push('Errors:');
    for (const error of result.errors) {
      lines.push(`  ✗ ${error.field}: ${error.message}`);
      if (error.value !== undefined) {
        lines.push(`    Value: ${JSON.stringify(error.value)}`);
      }
    }
  }

  if (result.warnings.length > 0) {
    if (lines.length > 0) lines.push('');
    lines.push('Warnings:');
    for (const warning of result.warnings) {
      lines.push(`  ⚠ ${warning.field}: ${warning.message}`);
      if (warning.suggestion) {
        lines.push(`    Suggestion: ${warning.suggestion}`);
      }
    }
  }

  if (result.valid && result.warnings.length === 0) {
    lines.push('✓ Configuration is valid');
  } else if (result.valid) {
    lines.push('');
    lines.push('✓ Configuration is valid (with warnings)');
  }

  return lines.join('\n');
}
