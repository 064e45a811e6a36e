// Path: src/lib/template/index.ts
// Public API for the template grammar module

export type { TemplateFormat, DetectedFormat } from './format.js';
export {
  TEMPLATE_FORMATS,
  detectFormat,
  detectAllFormats,
  parseFormat,
  describeFormat,
  formatPattern,
} from './format.js';

export type { TemplateToken } from './extractor.js';
export { extractTokens, tokenKey, formatToken, splitFieldSpec } from './extractor.js';

export { replaceToken, replaceAll, tokenPattern } from './replacer.js';
