// Path: src/lib/inspect.test.ts
// Tests for template validation and diff preview

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { CacheManager } from './cache.js';
import { MemorySecretProvider } from './provider/memory.js';
import { SecretResolver } from './resolver.js';
import { diffTemplate, validateTemplate } from './inspect.js';
import { BinaryFileError } from '../utils/error.js';

describe('template inspection', () => {
  let tmpDir: string;
  let provider: MemorySecretProvider;
  let resolver: SecretResolver;

  const write = (name: string, content: string | Buffer): string => {
    const target = path.join(tmpDir, name);
    fs.writeFileSync(target, content);
    return target;
  };

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'secret-inject-inspect-test-'));
    provider = new MemorySecretProvider({
      vaults: {
        Employee: {
          GITHUB_TOKEN: { credential: 'gh-test-token', username: 'octo' },
          NPM_TOKEN: { credential: 'npm-test-token' },
        },
      },
    });
    const cache = new CacheManager({ dir: path.join(tmpDir, 'cache'), ttlSeconds: 300 });
    resolver = new SecretResolver(provider, cache);
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  describe('validateTemplate', () => {
    it('should list tokens without looking them up when no resolver is given', async () => {
      const file = write('app.env.tpl', 'A=${GITHUB_TOKEN}\nB=${NPM_TOKEN:password}\n');
      const result = await validateTemplate(file);

      expect(result).toEqual({
        file,
        format: 'env',
        tokens: [
          { token: { identifier: 'GITHUB_TOKEN' } },
          { token: { identifier: 'NPM_TOKEN', field: 'password' } },
        ],
        issues: [],
      });
      expect(provider.calls.fetch).toBe(0);
    });

    it('should report which tokens resolve', async () => {
      const file = write('app.env.tpl', '${GITHUB_TOKEN}\n${MISSING}\n${GITHUB_TOKEN:username}\n');
      const result = await validateTemplate(file, { resolver });

      expect(result.tokens.map((t) => t.resolvable)).toEqual([true, false, true]);
    });

    it('should flag mixed grammars', async () => {
      const file = write('mixed.tpl', 'A=${GITHUB_TOKEN}\nB=%%NPM_TOKEN%%\n');
      const result = await validateTemplate(file);

      expect(result.format).toBe('env');
      expect(result.issues).toEqual(['Mixed template formats detected: env, custom']);
    });

    it('should flag lowercase placeholder names', async () => {
      const file = write('lower.tpl', 'A=${api_key}\n');
      const result = await validateTemplate(file);

      expect(result.format).toBe('none');
      expect(result.issues).toEqual(['Lowercase placeholder names detected (names must be UPPERCASE)']);
    });

    it('should honour a forced format', async () => {
      const file = write('forced.tpl', 'A=${GITHUB_TOKEN}\nB=%%NPM_TOKEN%%\n');
      const result = await validateTemplate(file, { format: 'custom' });
      expect(result.tokens).toEqual([{ token: { identifier: 'NPM_TOKEN' } }]);
    });

    it('should reject binary files', async () => {
      const file = write('blob.tpl', Buffer.from([0x00, 0x01, 0x02, 0x03]));
      await expect(validateTemplate(file)).rejects.toBeInstanceOf(BinaryFileError);
    });
  });

  describe('diffTemplate', () => {
    it('should show resolved lines as changes', async () => {
      const file = write('app.env.tpl', '# header\nA=${NPM_TOKEN}\n');
      const patch = await diffTemplate(file, resolver);

      expect(patch).toContain(`--- ${file}\n`);
      expect(patch).toContain(`+++ ${file} (resolved)\n`);
      expect(patch).toContain(' # header\n-A=${NPM_TOKEN}\n+A=npm-test-token\n');
    });

    it('should keep unresolved placeholders and never write', async () => {
      const file = write('app.env.tpl', 'A=${MISSING}\n');
      const patch = await diffTemplate(file, resolver);

      const added = patch.split('\n').filter((line) => line.startsWith('+') && !line.startsWith('+++'));
      expect(added).toEqual([]);
      expect(fs.readdirSync(tmpDir)).toEqual(['app.env.tpl']);
    });
  });
});
