// Path: src/utils/error.ts
// Error types and helpers - consolidate common error extraction patterns

/**
 * Extract error message from unknown error type.
 * Safely handles Error objects, strings, and other types.
 *
 * @param err - Unknown error value
 * @returns Error message string
 */
export function extractErrorMessage(err: unknown): string {
  if (err instanceof Error) {
    return err.message;
  }
  if (typeof err === 'string') {
    return err;
  }
  return String(err);
}

/**
 * Check whether provider output says the session is missing or expired.
 *
 * @param message - stderr text or error message
 */
export function isSignInMessage(message: string): boolean {
  const msg = message.toLowerCase();
  return msg.includes('not signed in') ||
         msg.includes('not currently signed in') ||
         msg.includes('session expired') ||
         msg.includes('authorization prompt dismissed') ||
         msg.includes('no accounts configured');
}

/**
 * Check whether provider output says the item or field does not exist.
 *
 * @param message - stderr text or error message
 */
export function isNotFoundMessage(message: string): boolean {
  const msg = message.toLowerCase();
  return msg.includes("isn't an item") ||
         msg.includes('not found') ||
         msg.includes('no item') ||
         msg.includes("isn't a vault") ||
         msg.includes('does not have a field');
}

/**
 * Base error for the injection engine. Carries a stable code for callers
 * and the CLI summary.
 */
export class InjectError extends Error {
  readonly code: string;
  readonly metadata?: Record<string, unknown>;
  readonly retryable: boolean;

  constructor(
    message: string,
    code: string,
    options?: {
      cause?: Error;
      metadata?: Record<string, unknown>;
      retryable?: boolean;
    }
  ) {
    super(message);
    this.name = 'InjectError';
    this.code = code;
    this.metadata = options?.metadata;
    this.retryable = options?.retryable ?? false;

    if (options?.cause) {
      this.cause = options.cause;
    }
  }
}

/**
 * The secret store has no usable session. Never retried automatically.
 */
export class NotSignedInError extends InjectError {
  readonly account?: string;

  constructor(account?: string, detail?: string, cause?: Error) {
    const target = account ? ` account: ${account}` : '';
    const hint = account ? `eval $(op signin --account ${account})` : 'eval $(op signin)';
    super(
      `Not signed in to secret store${target}${detail ? ` (${detail})` : ''}. Run: ${hint}`,
      'NOT_SIGNED_IN',
      { cause, metadata: { account } }
    );
    this.name = 'NotSignedInError';
    this.account = account;
  }
}

/**
 * One or more identifiers could not be resolved.
 */
export class SecretNotFoundError extends InjectError {
  readonly identifiers: string[];
  readonly vault?: string;

  constructor(identifiers: string | string[], vault?: string, cause?: Error) {
    const list = Array.isArray(identifiers) ? identifiers : [identifiers];
    const where = vault ? ` in vault "${vault}"` : '';
    const message = list.length === 1
      ? `Secret not found${where}: ${list[0]}`
      : `Failed to resolve secrets${where}: ${list.join(', ')}`;
    super(message, 'SECRET_NOT_FOUND', { cause, metadata: { identifiers: list, vault } });
    this.name = 'SecretNotFoundError';
    this.identifiers = list;
    this.vault = vault;
  }
}

/**
 * A format tag outside the known grammars reached the engine.
 */
export class UnsupportedFormatError extends InjectError {
  readonly format: string;

  constructor(format: string) {
    super(`Unknown template format: ${format}`, 'UNSUPPORTED_FORMAT', { metadata: { format } });
    this.name = 'UnsupportedFormatError';
    this.format = format;
  }
}

/**
 * Input looks binary; it is never read as a template.
 */
export class BinaryFileError extends InjectError {
  readonly file: string;

  constructor(file: string) {
    super(`Cannot process binary file: ${file}`, 'BINARY_FILE', { metadata: { file } });
    this.name = 'BinaryFileError';
    this.file = file;
  }
}

/**
 * Local cache read/write failure. Logged and treated as a miss.
 */
export class CacheIOError extends InjectError {
  constructor(operation: string, path: string, cause?: Error) {
    super(
      `Cache ${operation} failed for ${path}${cause ? `: ${cause.message}` : ''}`,
      'CACHE_IO',
      { cause, metadata: { operation, path } }
    );
    this.name = 'CacheIOError';
  }
}

/**
 * The provider CLI failed for a reason other than sign-in or a missing item.
 */
export class ProviderError extends InjectError {
  readonly exitCode?: number;

  constructor(message: string, exitCode?: number, cause?: Error) {
    super(message, 'PROVIDER_ERROR', { cause, metadata: { exitCode } });
    this.name = 'ProviderError';
    this.exitCode = exitCode;
  }
}

/**
 * Wrap an unknown error into an InjectError.
 *
 * @param err - Unknown error value
 * @param code - Error code
 * @param metadata - Additional metadata
 */
export function wrapError(
  err: unknown,
  code: string,
  metadata?: Record<string, unknown>
): InjectError {
  if (err instanceof InjectError) {
    return err;
  }
  const message = extractErrorMessage(err);
  const cause = err instanceof Error ? err : undefined;
  return new InjectError(message, code, { cause, metadata });
}
