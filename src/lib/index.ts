// Path: src/lib/index.ts
// Library entry point

export * from './template/index.js';
export * from './provider/index.js';
export { CacheManager, DEFAULT_CACHE_TTL_SECONDS, defaultCacheDir, type CacheOptions } from './cache.js';
export {
  SecretResolver,
  successfulValues,
  DEFAULT_FIELD,
  DEFAULT_VAULT,
  type ResolveOptions,
  type ResolveOutcome,
  type ResolvedSecret,
  type WarmCacheResult,
} from './resolver.js';
export {
  TemplateProcessor,
  collectTemplates,
  REDACTED,
  STDOUT_TARGET,
  type BatchSummary,
  type FileFailure,
  type FileProcessOptions,
  type FileSkipped,
  type FileSuccess,
  type OutputSink,
  type ProcessingResult,
  type ProcessOptions,
} from './processor.js';
export { validateTemplate, diffTemplate, type TemplateValidation, type TokenCheck } from './inspect.js';
export { createContext, type ContextOptions, type InjectContext } from './context.js';
export * from '../utils/error.js';
