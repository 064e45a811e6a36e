// Path: src/lib/template/format.ts
// Placeholder grammars and format detection

import { UnsupportedFormatError } from '../../utils/error.js';

/**
 * Placeholder grammars, in detection priority order:
 * - env:          ${SECRET_NAME} or ${SECRET_NAME:field}
 * - env-simple:   $SECRET_NAME
 * - go:           {{ op://Vault/SECRET_NAME/field }}
 * - custom:       %%SECRET_NAME%% or %%SECRET_NAME:field%%
 * - double-brace: {{SECRET_NAME}} or {{SECRET_NAME:field}}
 */
export type TemplateFormat = 'env' | 'env-simple' | 'go' | 'custom' | 'double-brace';

/**
 * Result of detection; 'none' means the content has no placeholder at all.
 */
export type DetectedFormat = TemplateFormat | 'none';

export const TEMPLATE_FORMATS: readonly TemplateFormat[] = [
  'env',
  'env-simple',
  'go',
  'custom',
  'double-brace',
];

/** Secret name: upper-case letters, digits and underscores, not starting with a digit */
export const NAME = '[A-Z_][A-Z0-9_]*';

/** Field qualifier after a colon */
export const FIELD = '[A-Za-z0-9_.-]+';

/**
 * Global pattern for each grammar. Capture groups:
 * - env / custom / double-brace: 1 = name, 2 = field (optional)
 * - env-simple: 1 = name
 * - go: 1 = scheme, 2 = vault, 3 = name, 4 = field
 */
export function formatPattern(format: TemplateFormat): RegExp {
  switch (format) {
    case 'env':
      return new RegExp(`\\$\\{(${NAME})(?::(${FIELD}))?\\}`, 'g');
    case 'env-simple':
      return new RegExp(`\\$(${NAME})(?![A-Za-z0-9_])`, 'g');
    case 'go':
      return /\{\{\s*([a-z][a-z0-9+.-]*):\/\/([^/\s}]+)\/([^/\s}]+)\/([^}\s]+)\s*\}\}/g;
    case 'custom':
      return new RegExp(`%%(${NAME})(?::(${FIELD}))?%%`, 'g');
    case 'double-brace':
      return new RegExp(`\\{\\{\\s*(${NAME})(?::(${FIELD}))?\\s*\\}\\}`, 'g');
    default:
      return assertNever(format);
  }
}

/**
 * Classify template content by the first grammar that matches.
 * Content matching several grammars resolves to the earliest grammar in detection order.
 */
export function detectFormat(content: string): DetectedFormat {
  for (const format of TEMPLATE_FORMATS) {
    if (formatPattern(format).test(content)) {
      return format;
    }
  }
  return 'none';
}

/**
 * Every grammar present in the content, in detection order.
 */
export function detectAllFormats(content: string): TemplateFormat[] {
  return TEMPLATE_FORMATS.filter((format) => formatPattern(format).test(content));
}

/**
 * Parse a user-supplied format name. 'auto' means "detect per file".
 */
export function parseFormat(value: string): TemplateFormat | 'auto' {
  if (value === 'auto') {
    return 'auto';
  }
  const match = TEMPLATE_FORMATS.find((format) => format === value);
  if (!match) {
    throw new UnsupportedFormatError(value);
  }
  return match;
}

/**
 * Human-readable example of a grammar for help and validation output.
 */
export function describeFormat(format: DetectedFormat): string {
  switch (format) {
    case 'env':
      return '${SECRET_NAME}';
    case 'env-simple':
      return '$SECRET_NAME';
    case 'go':
      return '{{ op://Vault/SECRET_NAME/field }}';
    case 'custom':
      return '%%SECRET_NAME%%';
    case 'double-brace':
      return '{{SECRET_NAME}}';
    case 'none':
      return 'no placeholders';
    default:
      return assertNever(format);
  }
}

/**
 * Exhaustiveness guard. Reaching it at run time means a format value
 * escaped the union, which is an engine bug.
 */
export function assertNever(format: never): never {
  throw new UnsupportedFormatError(String(format));
}
