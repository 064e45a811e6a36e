// Path: src/lib/cache.test.ts
// Unit tests for the on-disk TTL cache

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import crypto from 'node:crypto';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { CacheManager } from './cache.js';

describe('CacheManager', () => {
  let tmpDir: string;
  let cacheDir: string;
  let clock: number;

  const create = (ttlSeconds = 300, enabled = true): CacheManager =>
    new CacheManager({ dir: cacheDir, ttlSeconds, enabled, now: () => clock });

  const entryFile = (cache: CacheManager, ...args: string[]): string =>
    path.join(cacheDir, `${cache.key('secret', ...args)}.json`);

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'secret-inject-cache-test-'));
    cacheDir = path.join(tmpDir, 'cache');
    clock = 1_700_000_000_000;
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  describe('key', () => {
    it('should hash the operation and arguments as a JSON array', () => {
      const cache = create();
      const expected = crypto.createHash('sha256').update(JSON.stringify(['secret', 'A', 'credential'])).digest('hex');
      expect(cache.key('secret', 'A', 'credential')).toBe(expected);
    });

    it('should be deterministic', () => {
      const cache = create();
      expect(cache.key('secret', 'A')).toBe(cache.key('secret', 'A'));
    });

    it('should separate vaults and accounts', () => {
      const cache = create();
      const base = cache.key('secret', 'A', 'credential', 'Private', '');
      expect(cache.key('secret', 'A', 'credential', 'Shared', '')).not.toBe(base);
      expect(cache.key('secret', 'A', 'credential', 'Private', 'work.example.com')).not.toBe(base);
    });

    it('should not collide when argument boundaries move', () => {
      const cache = create();
      expect(cache.key('secret', 'ab', 'c')).not.toBe(cache.key('secret', 'a', 'bc'));
    });
  });

  describe('init', () => {
    it('should create the directory owner-only', () => {
      const cache = create();
      expect(cache.init()).toBe(true);
      expect(fs.statSync(cacheDir).mode & 0o777).toBe(0o700);
    });

    it('should tighten an existing directory', () => {
      fs.mkdirSync(cacheDir, { mode: 0o755 });
      fs.chmodSync(cacheDir, 0o755);
      create().init();
      expect(fs.statSync(cacheDir).mode & 0o777).toBe(0o700);
    });

    it('should discard entries found in a directory open to other users', () => {
      fs.mkdirSync(cacheDir);
      fs.chmodSync(cacheDir, 0o777);
      const cache = create();
      fs.writeFileSync(entryFile(cache, 'A'), JSON.stringify({ value: 'planted', createdAt: clock }));

      expect(cache.init()).toBe(true);
      expect(cache.get('secret', 'A')).toBeUndefined();
      expect(fs.readdirSync(cacheDir)).toEqual([]);
    });

    it('should keep entries in an existing owner-only directory', () => {
      fs.mkdirSync(cacheDir);
      fs.chmodSync(cacheDir, 0o700);
      const cache = create();
      fs.writeFileSync(entryFile(cache, 'A'), JSON.stringify({ value: 'kept', createdAt: clock }));

      expect(cache.init()).toBe(true);
      expect(cache.get('secret', 'A')).toBe('kept');
    });

    it('should refuse a symlinked directory', () => {
      const real = path.join(tmpDir, 'elsewhere');
      fs.mkdirSync(real, { mode: 0o700 });
      fs.symlinkSync(real, cacheDir);
      const cache = create();

      expect(cache.init()).toBe(false);
      expect(cache.set('s3cret', 'secret', 'A')).toBe(false);
      expect(fs.readdirSync(real)).toEqual([]);
    });

    it('should refuse a directory owned by another user', () => {
      fs.mkdirSync(cacheDir);
      fs.chmodSync(cacheDir, 0o700);
      const otherUid = fs.statSync(cacheDir).uid + 1;
      const cache = new CacheManager({ dir: cacheDir, ttlSeconds: 300, now: () => clock, uid: otherUid });
      fs.writeFileSync(entryFile(cache, 'A'), JSON.stringify({ value: 'planted', createdAt: clock }));

      expect(cache.init()).toBe(false);
      expect(cache.get('secret', 'A')).toBeUndefined();
    });
  });

  describe('set / get', () => {
    it('should return a stored value within the TTL', () => {
      const cache = create();
      expect(cache.set('s3cret', 'secret', 'A')).toBe(true);
      clock += 299_000;
      expect(cache.get('secret', 'A')).toBe('s3cret');
    });

    it('should miss once the TTL has passed', () => {
      const cache = create();
      cache.set('s3cret', 'secret', 'A');
      clock += 301_000;
      expect(cache.get('secret', 'A')).toBeUndefined();
    });

    it('should treat an entry exactly TTL old as expired', () => {
      const cache = create();
      cache.set('s3cret', 'secret', 'A');
      clock += 300_000;
      expect(cache.get('secret', 'A')).toBeUndefined();
    });

    it('should write entries with mode 0600', () => {
      const cache = create();
      cache.set('s3cret', 'secret', 'A');
      expect(fs.statSync(entryFile(cache, 'A')).mode & 0o777).toBe(0o600);
    });

    it('should store the value with its creation time', () => {
      const cache = create();
      cache.set('s3cret', 'secret', 'A');
      expect(JSON.parse(fs.readFileSync(entryFile(cache, 'A'), 'utf-8'))).toEqual({
        value: 's3cret',
        createdAt: 1_700_000_000_000,
      });
    });

    it('should always miss with a TTL of 0', () => {
      const cache = create(0);
      cache.set('s3cret', 'secret', 'A');
      expect(cache.get('secret', 'A')).toBeUndefined();
    });

    it('should miss until the directory has been initialized', () => {
      fs.mkdirSync(cacheDir);
      fs.chmodSync(cacheDir, 0o700);
      const cache = create();
      fs.writeFileSync(entryFile(cache, 'A'), JSON.stringify({ value: 's3cret', createdAt: clock }));

      expect(cache.get('secret', 'A')).toBeUndefined();
      cache.init();
      expect(cache.get('secret', 'A')).toBe('s3cret');
    });

    it('should treat an entry created in the future as expired', () => {
      const cache = create();
      cache.init();
      fs.writeFileSync(entryFile(cache, 'A'), JSON.stringify({ value: 'future', createdAt: clock + 1e12 }));

      expect(cache.get('secret', 'A')).toBeUndefined();
      expect(cache.sweep()).toBe(1);
    });

    it('should miss for an unknown key', () => {
      expect(create().get('secret', 'missing')).toBeUndefined();
    });

    it('should treat a corrupt entry as a miss', () => {
      const cache = create();
      cache.init();
      fs.writeFileSync(entryFile(cache, 'A'), 'not json');
      expect(cache.get('secret', 'A')).toBeUndefined();
    });

    it('should treat an entry of the wrong shape as a miss', () => {
      const cache = create();
      cache.init();
      fs.writeFileSync(entryFile(cache, 'A'), JSON.stringify({ value: 42 }));
      expect(cache.get('secret', 'A')).toBeUndefined();
    });

    it('should report success without touching disk when disabled', () => {
      const cache = create(300, false);
      expect(cache.set('s3cret', 'secret', 'A')).toBe(true);
      expect(cache.get('secret', 'A')).toBeUndefined();
      expect(fs.existsSync(cacheDir)).toBe(false);
    });

    it('should return false when the directory cannot be created', () => {
      // A regular file where the cache directory should be
      fs.writeFileSync(cacheDir, 'blocker');
      const cache = create();
      expect(cache.set('s3cret', 'secret', 'A')).toBe(false);
      expect(cache.get('secret', 'A')).toBeUndefined();
    });
  });

  describe('clear', () => {
    it('should remove the directory and allow later writes', () => {
      const cache = create();
      cache.set('one', 'secret', 'A');
      cache.clear();
      expect(fs.existsSync(cacheDir)).toBe(false);

      expect(cache.set('two', 'secret', 'A')).toBe(true);
      expect(cache.get('secret', 'A')).toBe('two');
    });
  });

  describe('sweep', () => {
    it('should remove expired and corrupt entries only', () => {
      const cache = create();
      cache.set('old', 'secret', 'A');
      clock += 200_000;
      cache.set('new', 'secret', 'B');
      fs.writeFileSync(entryFile(cache, 'C'), '{');
      clock += 150_000;

      expect(cache.sweep()).toBe(2);
      expect(cache.get('secret', 'B')).toBe('new');
      expect(fs.existsSync(entryFile(cache, 'A'))).toBe(false);
    });

    it('should return 0 when the directory does not exist', () => {
      expect(create().sweep()).toBe(0);
    });
  });
});
