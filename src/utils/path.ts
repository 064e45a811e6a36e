// Path: src/utils/path.ts
// Path helpers - traversal protection and template file naming

import path from 'node:path';

/**
 * Extensions that mark a file as a template by default.
 */
export const DEFAULT_TEMPLATE_EXTENSIONS = ['.template', '.tmpl', '.tpl'];

/**
 * Check if a path is safe (no traversal attempts).
 * Detects:
 * - Directory traversal segments (..)
 * - Null bytes (\0)
 *
 * @param userPath - Path to validate
 * @returns true if path is safe
 */
export function isPathSafe(userPath: string): boolean {
  if (userPath.includes('\0')) {
    return false;
  }

  const normalized = path.normalize(userPath);
  return !normalized.split(/[\\/]/).includes('..');
}

/**
 * Validate an output path for file operations.
 * Throws if the path is invalid or contains traversal attempts.
 *
 * @param filePath - Path to validate
 * @throws Error if path is invalid
 */
export function validateOutputPath(filePath: string): void {
  if (!filePath) {
    throw new Error('Path cannot be empty');
  }

  if (!path.isAbsolute(filePath)) {
    throw new Error(`Path must be absolute: ${filePath}`);
  }

  if (!isPathSafe(filePath)) {
    throw new Error(`Invalid path (potential traversal): ${filePath}`);
  }
}

/**
 * Check whether a file name carries one of the template extensions.
 */
export function hasTemplateExtension(
  filePath: string,
  extensions: readonly string[] = DEFAULT_TEMPLATE_EXTENSIONS
): boolean {
  return extensions.some((ext) => filePath.endsWith(ext) && filePath.length > ext.length);
}

/**
 * Derive the rendered file path from a template path.
 * `~/.aws/credentials.template` becomes `~/.aws/credentials`; a path with no
 * template extension is returned unchanged (in-place rendering).
 */
export function stripTemplateExtension(
  filePath: string,
  extensions: readonly string[] = DEFAULT_TEMPLATE_EXTENSIONS
): string {
  for (const ext of extensions) {
    if (filePath.endsWith(ext) && filePath.length > ext.length) {
      return filePath.slice(0, -ext.length);
    }
  }
  return filePath;
}
