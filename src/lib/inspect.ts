// Path: src/lib/inspect.ts
// Read-only template inspection: validation and diff preview

import fs from 'node:fs';
import { createTwoFilesPatch } from 'diff';
import type { SecretResolver } from './resolver.js';
import { TemplateProcessor } from './processor.js';
import {
  detectAllFormats,
  detectFormat,
  extractTokens,
  type DetectedFormat,
  type TemplateFormat,
  type TemplateToken,
} from './template/index.js';
import { BinaryFileError, InjectError } from '../utils/error.js';
import { isBinaryContent } from '../utils/file.js';

export interface TokenCheck {
  token: TemplateToken;
  /** Filled only when validation ran against a resolver */
  resolvable?: boolean;
}

export interface TemplateValidation {
  file: string;
  format: DetectedFormat;
  tokens: TokenCheck[];
  issues: string[];
}

export interface InspectOptions {
  format?: TemplateFormat | 'auto';
  vault?: string;
}

// Lower-case names are not matched by the grammars, so they are likely mistakes
const LOWERCASE_PLACEHOLDER = /\$\{[a-z_][a-z0-9_]*\}|\$[a-z_][a-z0-9_]*\b|%%[a-z_][a-z0-9_]*%%|\{\{[a-z_][a-z0-9_]*\}\}/;

function readText(file: string): string {
  if (!fs.existsSync(file)) {
    throw new InjectError(`File not found: ${file}`, 'INPUT_NOT_FOUND', { metadata: { file } });
  }
  const buffer = fs.readFileSync(file);
  if (isBinaryContent(buffer)) {
    throw new BinaryFileError(file);
  }
  return buffer.toString('utf-8');
}

/**
 * Report a template's grammar and tokens, and whether each token resolves
 * when a resolver is given. Never writes.
 */
export async function validateTemplate(
  file: string,
  options: InspectOptions & { resolver?: SecretResolver } = {}
): Promise<TemplateValidation> {
  const content = readText(file);
  const format: DetectedFormat =
    options.format && options.format !== 'auto' ? options.format : detectFormat(content);
  const result: TemplateValidation = { file, format, tokens: [], issues: [] };

  const formats = detectAllFormats(content);
  if (formats.length > 1) {
    result.issues.push(`Mixed template formats detected: ${formats.join(', ')}`);
  }
  if (LOWERCASE_PLACEHOLDER.test(content)) {
    result.issues.push('Lowercase placeholder names detected (names must be UPPERCASE)');
  }

  if (format === 'none') {
    return result;
  }

  for (const token of extractTokens(content, format)) {
    if (!options.resolver) {
      result.tokens.push({ token });
      continue;
    }
    const vault = token.vault ?? options.vault;
    const identifier = token.field ? `${token.identifier}:${token.field}` : token.identifier;
    result.tokens.push({ token, resolvable: await options.resolver.exists(identifier, vault) });
  }

  return result;
}

/**
 * Unified diff of the template against its would-be rendering.
 * Missing secrets keep their placeholders; values are not redacted.
 */
export async function diffTemplate(
  file: string,
  resolver: SecretResolver,
  options: InspectOptions = {}
): Promise<string> {
  const original = readText(file);
  const processor = new TemplateProcessor(resolver);
  const rendered = await processor.processContent(original, {
    format: options.format,
    vault: options.vault,
    allowMissing: true,
  });

  return createTwoFilesPatch(file, `${file} (resolved)`, original, rendered.content);
}
