// Path: src/lib/logger.ts
// Centralized Pino logger for secret-inject

import pino from 'pino';
import { createRequire } from 'node:module';

const require = createRequire(import.meta.url);
const isTest = process.env.NODE_ENV === 'test' || process.env.VITEST !== undefined;

// Cache the result
let pinoPrettyAvailable: boolean | null = null;

/**
 * Pretty transport for interactive terminals.
 * stdout carries rendered templates, so every destination is stderr (fd 2).
 */
function createTransport(): pino.TransportSingleOptions | undefined {
  if (isTest || !process.stderr.isTTY) {
    return undefined;
  }

  if (pinoPrettyAvailable === null) {
    try {
      require.resolve('pino-pretty');
      pinoPrettyAvailable = true;
    } catch {
      pinoPrettyAvailable = false;
    }
  }

  if (!pinoPrettyAvailable) {
    return undefined;
  }

  return {
    target: 'pino-pretty',
    options: {
      colorize: true,
      destination: 2,
      translateTime: 'SYS:standard',
      ignore: 'pid,hostname,service',
    },
  };
}

const transport = createTransport();

/**
 * Base logger instance
 *
 * Configure via environment variables:
 * - LOG_LEVEL: trace, debug, info, warn, error, fatal (default: warn)
 */
export const logger = pino(
  {
    level: process.env.LOG_LEVEL ?? 'warn',
    transport,
    base: {
      service: 'secret-inject',
      pid: process.pid,
    },
    // Secret values must never reach a log line
    redact: {
      paths: ['value', 'secretValue', 'password', '*.value', '*.secretValue'],
      censor: '[REDACTED]',
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  },
  transport ? undefined : pino.destination(2)
);

/**
 * Create a child logger with additional context
 *
 * @example
 * const log = createLogger({ module: 'processor' });
 * log.info({ file: 'app.env.template' }, 'Template processed');
 */
export function createLogger(context: Record<string, unknown>): pino.Logger {
  return logger.child(context);
}

/**
 * Raise or lower verbosity at runtime (used by --verbose).
 * Child loggers follow the parent unless they set their own level.
 */
export function setLogLevel(level: pino.LevelWithSilent): void {
  logger.level = level;
  for (const child of [cacheLogger, providerLogger, resolverLogger, processorLogger, configLogger]) {
    child.level = level;
  }
}

// Pre-configured module loggers
export const cacheLogger = createLogger({ module: 'cache' });
export const providerLogger = createLogger({ module: 'provider' });
export const resolverLogger = createLogger({ module: 'resolver' });
export const processorLogger = createLogger({ module: 'processor' });
export const configLogger = createLogger({ module: 'config' });
