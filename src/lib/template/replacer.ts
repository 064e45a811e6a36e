// Path: src/lib/template/replacer.ts
// Literal, grammar-aware substitution of resolved values

import { UnsupportedFormatError } from '../../utils/error.js';
import { FIELD, type TemplateFormat } from './format.js';
import { tokenKey, type TemplateToken } from './extractor.js';

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Pattern matching exactly one token's spelling in a grammar.
 * A token without a field does not match the same name with a field,
 * and neither matches a longer name that shares the prefix.
 */
export function tokenPattern(token: TemplateToken, format: TemplateFormat): RegExp {
  const name = escapeRegExp(token.identifier);
  const field = token.field ? `:${escapeRegExp(token.field)}` : '';

  switch (format) {
    case 'env':
      return new RegExp(`\\$\\{${name}${field}\\}`, 'g');
    case 'env-simple':
      return new RegExp(`\\$${name}(?![A-Za-z0-9_])`, 'g');
    case 'go': {
      const scheme = escapeRegExp(token.scheme ?? 'op');
      const vault = token.vault ? escapeRegExp(token.vault) : '[^/\\s}]+';
      const goField = token.field ? escapeRegExp(token.field) : FIELD;
      return new RegExp(`\\{\\{\\s*${scheme}://${vault}/${name}/${goField}\\s*\\}\\}`, 'g');
    }
    case 'custom':
      return new RegExp(`%%${name}${field}%%`, 'g');
    case 'double-brace':
      return new RegExp(`\\{\\{\\s*${name}${field}\\s*\\}\\}`, 'g');
    default:
      throw new UnsupportedFormatError(String(format));
  }
}

/**
 * Replace every occurrence of one token with its value.
 * The value is inserted verbatim: `$&` and friends are not expanded and the
 * result is never scanned for placeholders again.
 */
export function replaceToken(
  content: string,
  token: TemplateToken,
  value: string,
  format: TemplateFormat
): string {
  return content.replace(tokenPattern(token, format), () => value);
}

/**
 * Replace a batch of tokens in a single pass over the content, so a value
 * that happens to contain another token's placeholder is left alone.
 * Tokens without an entry in `values` keep their placeholder text.
 */
export function replaceAll(
  content: string,
  tokens: readonly TemplateToken[],
  values: ReadonlyMap<string, string>,
  format: TemplateFormat
): string {
  const entries = tokens
    .map((token) => ({ token, value: values.get(tokenKey(token)) }))
    .filter((entry): entry is { token: TemplateToken; value: string } => entry.value !== undefined);

  if (entries.length === 0) {
    return content;
  }

  const patterns = entries.map(({ token }) => `(${tokenPattern(token, format).source})`);
  const combined = new RegExp(patterns.join('|'), 'g');

  return content.replace(combined, (...args: unknown[]) => {
    // Capture groups come first; the index of the group that matched picks the entry
    for (let i = 0; i < entries.length; i++) {
      if (args[i + 1] !== undefined) {
        return entries[i].value;
      }
    }
    return String(args[0]);
  });
}
