// Path: src/lib/cache.ts
// File-backed TTL cache for secret lookups

import fs, { type Stats } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { cacheLogger as log } from './logger.js';
import { CacheIOError } from '../utils/error.js';
import { hashContent, writeAtomic } from '../utils/file.js';

/** Default time-to-live for cached values (5 minutes) */
export const DEFAULT_CACHE_TTL_SECONDS = 300;

const ENTRY_SUFFIX = '.json';

export interface CacheOptions {
  /** Cache root; created with 0700 permissions */
  dir: string;
  /** Lifetime of an entry in seconds. 0 or less means every read misses */
  ttlSeconds: number;
  /** When false, set() is a successful no-op and get() always misses */
  enabled?: boolean;
  /** Clock in epoch milliseconds (default: Date.now) */
  now?: () => number;
  /** Required owner of the directory and its entries (default: the current user) */
  uid?: number;
}

/**
 * On-disk entry: the value plus the moment it was stored
 */
interface CacheEntryFile {
  value: string;
  createdAt: number;
}

function isCacheEntry(value: unknown): value is CacheEntryFile {
  return typeof value === 'object' && value !== null &&
    'value' in value && typeof value.value === 'string' &&
    'createdAt' in value && typeof value.createdAt === 'number';
}

function isMissing(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

function lstatIfExists(file: string): Stats | undefined {
  try {
    return fs.lstatSync(file);
  } catch (err) {
    if (isMissing(err)) {
      return undefined;
    }
    throw err;
  }
}

/**
 * Per-user default cache directory under the system temp dir
 */
export function defaultCacheDir(): string {
  const uid = process.getuid?.() ?? os.userInfo().username;
  return path.join(os.tmpdir(), `secret-inject-cache-${uid}`);
}

/**
 * Content-addressed cache with one file per key.
 *
 * Every I/O failure is logged as a CacheIOError and turned into a miss (for
 * reads) or a `false` return (for writes); nothing here throws to the caller.
 * Concurrent processes may race on an entry; the loser costs one extra fetch.
 */
export class CacheManager {
  readonly dir: string;
  readonly ttlSeconds: number;
  readonly enabled: boolean;
  private readonly now: () => number;
  private readonly uid: number | undefined;
  private initialized = false;

  constructor(options: CacheOptions) {
    this.dir = path.resolve(options.dir);
    this.ttlSeconds = options.ttlSeconds;
    this.enabled = options.enabled ?? true;
    this.now = options.now ?? Date.now;
    this.uid = options.uid ?? process.getuid?.();
  }

  /**
   * Create the cache directory with owner-only permissions, or adopt an
   * existing one. Reads miss until this has succeeded; set() calls it on demand.
   *
   * An existing path is only adopted when it is a real directory owned by the
   * expected user. Entries found in a directory other users could reach are
   * discarded.
   */
  init(): boolean {
    if (!this.enabled) {
      return true;
    }
    try {
      this.prepareDir();
      this.initialized = true;
      return true;
    } catch (err) {
      this.initialized = false;
      this.report(new CacheIOError('init', this.dir, err instanceof Error ? err : undefined));
      return false;
    }
  }

  /**
   * Deterministic key over the operation and its ordered arguments.
   * Callers must pass every namespace (vault, account) that scopes the value.
   */
  key(operation: string, ...args: readonly string[]): string {
    return hashContent(JSON.stringify([operation, ...args]));
  }

  /**
   * Store a value. Reports success without touching disk when disabled.
   */
  set(value: string, operation: string, ...args: readonly string[]): boolean {
    if (!this.enabled) {
      return true;
    }
    if (!this.initialized && !this.init()) {
      return false;
    }

    const file = this.entryPath(this.key(operation, ...args));
    const entry: CacheEntryFile = { value, createdAt: this.now() };
    try {
      writeAtomic(file, JSON.stringify(entry), { mode: 0o600, createDirs: false });
      log.debug({ operation, key: path.basename(file, ENTRY_SUFFIX) }, 'Cache entry written');
      return true;
    } catch (err) {
      this.report(new CacheIOError('write', file, err instanceof Error ? err : undefined));
      return false;
    }
  }

  /**
   * Read a value if it is younger than the TTL.
   */
  get(operation: string, ...args: readonly string[]): string | undefined {
    if (!this.enabled || this.ttlSeconds <= 0 || !this.initialized) {
      return undefined;
    }

    const file = this.entryPath(this.key(operation, ...args));
    const entry = this.readEntry(file);
    if (!entry) {
      return undefined;
    }
    if (!this.isFresh(entry)) {
      log.debug({ operation }, 'Cache entry expired');
      return undefined;
    }
    return entry.value;
  }

  /**
   * Remove the whole cache directory.
   */
  clear(): void {
    try {
      fs.rmSync(this.dir, { recursive: true, force: true });
      this.initialized = false;
      log.debug({ dir: this.dir }, 'Cache cleared');
    } catch (err) {
      this.report(new CacheIOError('clear', this.dir, err instanceof Error ? err : undefined));
    }
  }

  /**
   * Remove expired or unreadable entries, keeping fresh ones.
   * @returns Number of entries removed
   */
  sweep(): number {
    if (!lstatIfExists(this.dir) || (!this.initialized && !this.init())) {
      return 0;
    }

    let files: string[];
    try {
      files = fs.readdirSync(this.dir).filter((name) => name.endsWith(ENTRY_SUFFIX));
    } catch (err) {
      if (!isMissing(err)) {
        this.report(new CacheIOError('sweep', this.dir, err instanceof Error ? err : undefined));
      }
      return 0;
    }

    let removed = 0;
    for (const name of files) {
      const file = path.join(this.dir, name);
      const entry = this.readEntry(file);
      if (entry && this.isFresh(entry)) {
        continue;
      }
      try {
        fs.unlinkSync(file);
        removed++;
      } catch (err) {
        if (!isMissing(err)) {
          this.report(new CacheIOError('sweep', file, err instanceof Error ? err : undefined));
        }
      }
    }

    log.debug({ dir: this.dir, removed }, 'Cache swept');
    return removed;
  }

  private prepareDir(): void {
    if (!lstatIfExists(this.dir)) {
      fs.mkdirSync(this.dir, { recursive: true, mode: 0o700 });
    }

    const stat = fs.lstatSync(this.dir);
    if (stat.isSymbolicLink() || !stat.isDirectory()) {
      throw new Error(`Cache path is not a directory: ${this.dir}`);
    }
    if (!this.isOwned(stat)) {
      throw new Error(`Cache directory is owned by another user: ${this.dir}`);
    }

    fs.chmodSync(this.dir, 0o700);
    if ((stat.mode & 0o077) !== 0) {
      const discarded = this.discardEntries();
      log.warn({ dir: this.dir, discarded }, 'Cache directory was open to other users, discarded its entries');
    }
  }

  private discardEntries(): number {
    const names = fs.readdirSync(this.dir);
    for (const name of names) {
      fs.rmSync(path.join(this.dir, name), { recursive: true, force: true });
    }
    return names.length;
  }

  private isOwned(stat: Stats): boolean {
    return this.uid === undefined || stat.uid === this.uid;
  }

  /** Fresh while 0 <= age < ttl; a creation time in the future never is */
  private isFresh(entry: CacheEntryFile): boolean {
    const age = this.now() - entry.createdAt;
    return this.ttlSeconds > 0 && age >= 0 && age < this.ttlSeconds * 1000;
  }

  private readEntry(file: string): CacheEntryFile | undefined {
    let raw: string;
    try {
      const stat = fs.lstatSync(file);
      if (!stat.isFile() || !this.isOwned(stat)) {
        log.warn({ file }, 'Ignoring cache entry that is not a file owned by the cache user');
        return undefined;
      }
      raw = fs.readFileSync(file, 'utf-8');
    } catch (err) {
      if (!isMissing(err)) {
        this.report(new CacheIOError('read', file, err instanceof Error ? err : undefined));
      }
      return undefined;
    }

    try {
      const parsed: unknown = JSON.parse(raw);
      if (isCacheEntry(parsed)) {
        return parsed;
      }
    } catch {
      // Corrupt entry, handled below
    }
    log.debug({ file }, 'Ignoring malformed cache entry');
    return undefined;
  }

  private entryPath(key: string): string {
    return path.join(this.dir, `${key}${ENTRY_SUFFIX}`);
  }

  private report(err: CacheIOError): void {
    log.warn({ err, code: err.code }, 'Cache I/O failed, continuing without cache');
  }
}
