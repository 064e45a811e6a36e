// Path: src/lib/validation.test.ts
// Unit tests for config validation

import { describe, it, expect } from 'vitest';
import { validateConfig, formatValidationResult } from './validation.js';
import { withDefaults, type InjectConfig } from './config/index.js';

describe('validateConfig', () => {
  const validConfig = (): InjectConfig => withDefaults({});

  it('should pass for the default configuration', () => {
    const result = validateConfig(validConfig());
    expect(result.valid).toBe(true);
    expect(result.errors).toHaveLength(0);
    expect(result.warnings).toHaveLength(0);
  });

  it('should fail when defaultVault is empty', () => {
    const config = { ...validConfig(), defaultVault: '' };
    const result = validateConfig(config);
    expect(result.valid).toBe(false);
    expect(result.errors.some(e => e.field === 'defaultVault')).toBe(true);
  });

  it('should fail when defaultField is empty', () => {
    const config = { ...validConfig(), defaultField: '' };
    expect(validateConfig(config).errors.some(e => e.field === 'defaultField')).toBe(true);
  });

  it('should fail for an alias without a target', () => {
    const config = { ...validConfig(), accounts: { work: '' } };
    const result = validateConfig(config);
    expect(result.errors.some(e => e.field === 'accounts.work')).toBe(true);
  });

  it('should warn when the default account is an unknown alias', () => {
    const config = { ...validConfig(), defaultAccount: 'personal' };
    const result = validateConfig(config);
    expect(result.valid).toBe(true);
    expect(result.warnings.some(w => w.field === 'defaultAccount')).toBe(true);
  });

  it('should accept a known alias or an account domain as default account', () => {
    expect(validateConfig({ ...validConfig(), accounts: { work: 'acme.example.com' }, defaultAccount: 'work' }).warnings)
      .toHaveLength(0);
    expect(validateConfig({ ...validConfig(), defaultAccount: 'me.example.com' }).warnings).toHaveLength(0);
  });

  it('should fail for a negative TTL', () => {
    const config = validConfig();
    config.cache.ttlSeconds = -1;
    expect(validateConfig(config).errors.some(e => e.field === 'cache.ttlSeconds')).toBe(true);
  });

  it('should warn for a TTL of 0 only while the cache is enabled', () => {
    const config = validConfig();
    config.cache.ttlSeconds = 0;
    expect(validateConfig(config).warnings.some(w => w.field === 'cache.ttlSeconds')).toBe(true);

    config.cache.enabled = false;
    expect(validateConfig(config).warnings).toHaveLength(0);
  });

  it('should warn for a TTL over an hour', () => {
    const config = validConfig();
    config.cache.ttlSeconds = 7200;
    const result = validateConfig(config);
    expect(result.valid).toBe(true);
    expect(result.warnings.some(w => w.field === 'cache.ttlSeconds')).toBe(true);
  });

  it('should fail for a relative cache directory', () => {
    const config = validConfig();
    config.cache.dir = 'cache';
    expect(validateConfig(config).errors.some(e => e.field === 'cache.dir')).toBe(true);
  });

  it('should fail for a non-positive provider timeout', () => {
    const config = validConfig();
    config.provider.timeoutMs = 0;
    expect(validateConfig(config).errors.some(e => e.field === 'provider.timeoutMs')).toBe(true);
  });

  it('should fail for template extensions without a dot', () => {
    const config = { ...validConfig(), templateExtensions: ['.tpl', 'tmpl'] };
    const result = validateConfig(config);
    expect(result.errors).toEqual([
      { field: 'templateExtensions', message: 'Extensions must start with a dot', value: 'tmpl' },
    ]);
  });

  it('should warn when no template extensions are configured', () => {
    const config = { ...validConfig(), templateExtensions: [] };
    expect(validateConfig(config).warnings.some(w => w.field === 'templateExtensions')).toBe(true);
  });
});

describe('formatValidationResult', () => {
  it('should format a valid result', () => {
    const result = { valid: true, errors: [], warnings: [] };
    expect(formatValidationResult(result)).toBe('✓ Configuration is valid');
  });

  it('should format errors with their values', () => {
    const result = {
      valid: false,
      errors: [{ field: 'cache.ttlSeconds', message: 'TTL must be a non-negative number of seconds', value: -1 }],
      warnings: [],
    };
    expect(formatValidationResult(result)).toBe(
      'Errors:\n  ✗ cache.ttlSeconds: TTL must be a non-negative number of seconds\n    Value: -1'
    );
  });

  it('should format warnings with suggestions', () => {
    const result = {
      valid: true,
      errors: [],
      warnings: [{ field: 'cache.ttlSeconds', message: 'Secrets stay on disk for more than an hour', suggestion: 'Use a TTL of 300 seconds or less' }],
    };
    const output = formatValidationResult(result);
    expect(output).toBe(
      'Warnings:\n' +
      '  ⚠ cache.ttlSeconds: Secrets stay on disk for more than an hour\n' +
      '    Suggestion: Use a TTL of 300 seconds or less\n' +
      '\n' +
      '✓ Configuration is valid (with warnings)'
    );
  });
});
