// Path: src/utils/file.ts
// Atomic file write utilities - prevent partial writes and ensure data integrity

import fs from 'node:fs';
import path from 'node:path';
import crypto from 'node:crypto';
import { isBinaryFileSync } from 'isbinaryfile';
import { validateOutputPath } from './path.js';

export interface AtomicWriteOptions {
  /**
   * File permissions (octal number, e.g., 0o640).
   * Defaults to 0o600.
   */
  mode?: number;

  /**
   * Create parent directories if they don't exist.
   * Defaults to true.
   */
  createDirs?: boolean;

  /**
   * Mode for created parent directories.
   * Defaults to 0o700.
   */
  dirMode?: number;

  /**
   * Copy the existing file to filePath + '.backup' before replacing it.
   * Defaults to false.
   */
  backup?: boolean;
}

const DEFAULT_OPTIONS: Required<AtomicWriteOptions> = {
  mode: 0o600,
  createDirs: true,
  dirMode: 0o700,
  backup: false,
};

/**
 * Write content to a file atomically.
 *
 * Uses temp file + rename pattern to ensure the file is either
 * fully written or not modified at all.
 *
 * @param filePath - Absolute path to target file
 * @param content - Content to write (string or Buffer)
 * @param options - Write options
 * @returns Hash of written content (SHA-256)
 */
export function writeAtomic(
  filePath: string,
  content: string | Buffer,
  options: AtomicWriteOptions = {}
): string {
  validateOutputPath(filePath);

  const opts = { ...DEFAULT_OPTIONS, ...options };
  const dir = path.dirname(filePath);
  const tempPath = `${filePath}.tmp.${process.pid}`;

  if (opts.createDirs && !fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true, mode: opts.dirMode });
  }

  if (opts.backup && fs.existsSync(filePath)) {
    fs.copyFileSync(filePath, `${filePath}.backup`);
  }

  try {
    fs.writeFileSync(tempPath, content, { mode: opts.mode });
    // writeFileSync honours umask; the copied-forward mode must be exact
    fs.chmodSync(tempPath, opts.mode);
    fs.renameSync(tempPath, filePath);
    return hashContent(content);
  } catch (err) {
    // Clean up temp file on error
    try {
      if (fs.existsSync(tempPath)) {
        fs.unlinkSync(tempPath);
      }
    } catch {
      // Ignore cleanup errors
    }
    throw err;
  }
}

/**
 * Calculate SHA-256 hash of content.
 */
export function hashContent(content: string | Buffer): string {
  return crypto.createHash('sha256').update(content).digest('hex');
}

/**
 * Permission bits of an existing file, or undefined when it does not exist.
 */
export function getFileMode(filePath: string): number | undefined {
  try {
    return fs.statSync(filePath).mode & 0o7777;
  } catch {
    return undefined;
  }
}

/**
 * Probe a buffer for binary content (NUL bytes, invalid encodings,
 * known binary signatures).
 */
export function isBinaryContent(buffer: Buffer): boolean {
  if (buffer.length === 0) {
    return false;
  }
  return isBinaryFileSync(buffer, buffer.length);
}
