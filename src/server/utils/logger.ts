import pino from 'pino';
import type { Logger } from 'pino';
import { AsyncLocalStorage } from 'async_hooks';

/**
 * AsyncLocalStorage for request context (request ID, method, path)
 */
export const requestContext = new AsyncLocalStorage<Record<string, unknown>>();

/**
 * Get current request context
 */
export function getRequestContext(): Record<string, unknown> {
  return requestContext.getStore() || {};
}

function resolveLevel(): pino.Level {
  const isDevelopment = process.env.NODE_ENV !== 'production';
  const requested = process.env.LOG_LEVEL;
  const levels: pino.Level[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace'];
  const match = levels.find((level) => level === requested);
  if (match) {
    return match;
  }
  return isDevelopment ? 'debug' : 'info';
}

/**
 * Create logger instance based on environment
 */
function createLogger(): Logger {
  const isDevelopment = process.env.NODE_ENV === 'development';
  const isTest = process.env.NODE_ENV === 'test' || process.env.VITEST === 'true';

  return pino({
    level: isTest ? 'silent' : resolveLevel(),
    base: {
      env: process.env.NODE_ENV || 'development',
      service: 'sipscout-api',
    },
    formatters: {
      level: (label) => {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    // Request context is merged into every line emitted inside requestContext.run()
    mixin: () => getRequestContext(),
    ...(isDevelopment && process.env.LOG_PRETTY !== 'false' && {
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      },
    }),
  });
}

/**
 * Main logger instance
 */
export const logger = createLogger();

/**
 * Create a child logger with additional context
 */
export function createChildLogger(additionalContext: Record<string, unknown>): Logger {
  return logger.child(additionalContext);
}
