// Path: src/lib/resolver.test.ts
// Unit tests for cache-backed secret resolution

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { CacheManager } from './cache.js';
import { MemorySecretProvider } from './provider/memory.js';
import { SecretResolver, successfulValues } from './resolver.js';
import { NotSignedInError, SecretNotFoundError } from '../utils/error.js';

describe('SecretResolver', () => {
  let tmpDir: string;
  let clock: number;
  let provider: MemorySecretProvider;
  let cache: CacheManager;
  let resolver: SecretResolver;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'secret-inject-resolver-test-'));
    clock = 1_700_000_000_000;
    provider = new MemorySecretProvider({
      vaults: {
        Employee: {
          GITHUB_TOKEN: { credential: 'gh-test-token', username: 'octo' },
          NPM_TOKEN: { credential: 'npm-test-token' },
        },
        Infra: {
          GITHUB_TOKEN: { credential: 'infra-test-token' },
        },
      },
    });
    cache = new CacheManager({ dir: path.join(tmpDir, 'cache'), ttlSeconds: 300, now: () => clock });
    resolver = new SecretResolver(provider, cache, { vault: 'Employee', field: 'credential' });
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  describe('resolve', () => {
    it('should fetch once and serve repeats from cache within the TTL', async () => {
      expect(await resolver.resolve('GITHUB_TOKEN')).toBe('gh-test-token');
      clock += 60_000;
      expect(await resolver.resolve('GITHUB_TOKEN')).toBe('gh-test-token');
      expect(provider.calls.fetch).toBe(1);
    });

    it('should fetch again after the TTL', async () => {
      await resolver.resolve('GITHUB_TOKEN');
      clock += 301_000;
      await resolver.resolve('GITHUB_TOKEN');
      expect(provider.calls.fetch).toBe(2);
    });

    it('should bypass the cache when asked', async () => {
      await resolver.resolve('GITHUB_TOKEN');
      await resolver.resolve('GITHUB_TOKEN', { useCache: false });
      expect(provider.calls.fetch).toBe(2);
    });

    it('should honour an inline field', async () => {
      expect(await resolver.resolve('GITHUB_TOKEN:username')).toBe('octo');
    });

    it('should not split a literal identifier at its colon', async () => {
      provider.setSecret('Employee', 'a:b', 'username', 'literal-user');
      expect(await resolver.resolve('a:b', { field: 'username', literal: true })).toBe('literal-user');
    });

    it('should keep vaults apart in the cache', async () => {
      expect(await resolver.resolve('GITHUB_TOKEN')).toBe('gh-test-token');
      expect(await resolver.resolve('GITHUB_TOKEN', { vault: 'Infra' })).toBe('infra-test-token');
      expect(provider.calls.fetch).toBe(2);
    });

    it('should not cache failures', async () => {
      await expect(resolver.resolve('MISSING')).rejects.toBeInstanceOf(SecretNotFoundError);
      provider.setSecret('Employee', 'MISSING', 'credential', 'late-value');
      expect(await resolver.resolve('MISSING')).toBe('late-value');
    });

    it('should propagate sign-in failures', async () => {
      provider.signedIn = false;
      await expect(resolver.resolve('GITHUB_TOKEN')).rejects.toBeInstanceOf(NotSignedInError);
    });
  });

  describe('resolveDetailed', () => {
    it('should report where the value came from', async () => {
      const first = await resolver.resolveDetailed('GITHUB_TOKEN');
      const second = await resolver.resolveDetailed('GITHUB_TOKEN');
      expect(first).toMatchObject({ identifier: 'GITHUB_TOKEN', vault: 'Employee', field: 'credential', source: 'provider' });
      expect(second.source).toBe('cache');
    });
  });

  describe('getOrDefault', () => {
    it('should return the value when it resolves', async () => {
      expect(await resolver.getOrDefault('NPM_TOKEN', 'fallback')).toBe('npm-test-token');
    });

    it('should return the default on any failure', async () => {
      expect(await resolver.getOrDefault('MISSING', 'fallback')).toBe('fallback');
      provider.signedIn = false;
      expect(await resolver.getOrDefault('NPM_TOKEN', 'fallback', { useCache: false })).toBe('fallback');
    });
  });

  describe('exists', () => {
    it('should report whether an identifier resolves', async () => {
      expect(await resolver.exists('GITHUB_TOKEN')).toBe(true);
      expect(await resolver.exists('MISSING')).toBe(false);
      expect(await resolver.exists('NPM_TOKEN', 'Infra')).toBe(false);
    });
  });

  describe('batchResolve', () => {
    it('should continue past failures and report each outcome', async () => {
      const outcomes = await resolver.batchResolve('Employee', ['GITHUB_TOKEN:username', 'MISSING', 'NPM_TOKEN']);

      expect(Array.from(outcomes.keys())).toEqual(['GITHUB_TOKEN', 'MISSING', 'NPM_TOKEN']);
      expect(outcomes.get('GITHUB_TOKEN')).toEqual({ ok: true, value: 'octo', field: 'username' });
      expect(outcomes.get('NPM_TOKEN')).toEqual({ ok: true, value: 'npm-test-token', field: 'credential' });

      const missing = outcomes.get('MISSING');
      expect(missing?.ok).toBe(false);
      if (missing && !missing.ok) {
        expect(missing.error).toBeInstanceOf(SecretNotFoundError);
      }
    });

    it('should give a value-only view of successes', async () => {
      const outcomes = await resolver.batchResolve('Employee', ['GITHUB_TOKEN', 'MISSING']);
      expect(successfulValues(outcomes)).toEqual(new Map([['GITHUB_TOKEN', 'gh-test-token']]));
    });
  });

  describe('warmCache', () => {
    it('should cache every item in the vault', async () => {
      const result = await resolver.warmCache();

      expect(result).toEqual({ vault: 'Employee', warmed: ['GITHUB_TOKEN', 'NPM_TOKEN'], failed: [] });
      expect(provider.calls.list).toBe(1);
      expect(provider.calls.fetch).toBe(2);

      await resolver.resolve('GITHUB_TOKEN');
      await resolver.resolve('NPM_TOKEN');
      expect(provider.calls.fetch).toBe(2);
    });

    it('should look item titles up as-is even when they contain a colon', async () => {
      provider.setSecret('Employee', 'aws:prod', 'credential', 'aws-test-key');
      const result = await resolver.warmCache();

      expect(result).toEqual({ vault: 'Employee', warmed: ['GITHUB_TOKEN', 'NPM_TOKEN', 'aws:prod'], failed: [] });
      expect(await resolver.resolve('aws:prod', { literal: true })).toBe('aws-test-key');
      expect(provider.calls.fetch).toBe(3);
    });

    it('should report items without the default field as failed', async () => {
      provider.setSecret('Infra', 'SSH_KEY', 'private key', 'test-key');
      const result = await resolver.warmCache('Infra');
      expect(result).toEqual({ vault: 'Infra', warmed: ['GITHUB_TOKEN'], failed: ['SSH_KEY'] });
    });
  });
});
