// Path: src/lib/template/extractor.ts
// Token extraction for each placeholder grammar

import { UnsupportedFormatError } from '../../utils/error.js';
import { formatPattern, TEMPLATE_FORMATS, type TemplateFormat } from './format.js';

/**
 * A secret reference found in a template
 */
export interface TemplateToken {
  /** Secret name in the store */
  identifier: string;
  /** Field within the secret (e.g. "credential", "password") */
  field?: string;
  /** Vault named by the placeholder itself (go-style references only) */
  vault?: string;
  /** URL scheme of a go-style reference, e.g. "op" */
  scheme?: string;
}

/**
 * Identity of a token inside a set: two placeholders that spell the same
 * reference collapse into one lookup.
 */
export function tokenKey(token: TemplateToken): string {
  return [token.scheme ?? '', token.vault ?? '', token.identifier, token.field ?? ''].join('\u0000');
}

/**
 * Display form used in logs, warnings and validation output.
 * Never includes a value.
 */
export function formatToken(token: TemplateToken): string {
  const base = token.vault ? `${token.vault}/${token.identifier}` : token.identifier;
  return token.field ? `${base}:${token.field}` : base;
}

/**
 * Split an inline "NAME:field" spec. Names never contain a colon.
 */
export function splitFieldSpec(spec: string): { identifier: string; field?: string } {
  const trimmed = spec.trim();
  const colon = trimmed.indexOf(':');
  if (colon <= 0) {
    return { identifier: trimmed };
  }
  const field = trimmed.slice(colon + 1).trim();
  return {
    identifier: trimmed.slice(0, colon).trim(),
    field: field || undefined,
  };
}

function tokenFromMatch(match: RegExpMatchArray, format: TemplateFormat): TemplateToken {
  switch (format) {
    case 'env':
    case 'custom':
    case 'double-brace':
      return match[2]
        ? { identifier: match[1].trim(), field: match[2].trim() }
        : { identifier: match[1].trim() };
    case 'env-simple':
      return { identifier: match[1].trim() };
    case 'go':
      return {
        scheme: match[1],
        vault: match[2].trim(),
        identifier: match[3].trim(),
        field: match[4].trim(),
      };
    default:
      throw new UnsupportedFormatError(String(format));
  }
}

/**
 * Extract the unique set of tokens for a grammar, in first-seen order.
 * An empty result is valid.
 *
 * @throws UnsupportedFormatError for a format outside the known grammars
 */
export function extractTokens(content: string, format: TemplateFormat): TemplateToken[] {
  if (!TEMPLATE_FORMATS.includes(format)) {
    throw new UnsupportedFormatError(String(format));
  }

  const seen = new Map<string, TemplateToken>();
  for (const match of content.matchAll(formatPattern(format))) {
    const token = tokenFromMatch(match, format);
    const key = tokenKey(token);
    if (!seen.has(key)) {
      seen.set(key, token);
    }
  }
  return Array.from(seen.values());
}
