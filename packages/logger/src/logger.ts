import os from 'node:os';
import { Writable } from 'node:stream';

import pino from 'pino';

import { type LogLevel, validateLoggerEnv } from './env.schema.js';

// Validate environment variables (reads NODE_ENV directly from process.env)
const env = validateLoggerEnv(process.env);

/**
 * Formats a log label string to be a fixed length. When the label string
 * is longer than the specified size, it is truncated and prefixed by a
 * horizontal ellipsis (…).
 */
export function formatLabel(label: string, size: number): string {
  const str = label.padStart(size);
  return str.length <= size ? str : `…${str.slice(-size + 1)}`;
}

export type Logger = pino.Logger;

export interface LoggerOverrides {
  /** Write JSON lines here instead of the env-selected transports. */
  destination?: pino.DestinationStream | undefined;
  level?: LogLevel | undefined;
}

// Cache for loggers
const loggerCache = new Map<string, Logger>();

// Root logger instance
let rootLogger: Logger | undefined;

let overrides: LoggerOverrides = {};

function currentLevel(): string {
  return overrides.level ?? env.LOGGER_LOG_LEVEL;
}

/**
 * Creates and configures the root logger instance.
 */
function createRootLogger(): Logger {
  interface TransportTarget {
    level: string;
    options: Record<string, unknown>;
    target: string;
  }

  const transportTargets: TransportTarget[] = [];

  // Skip all transports in test environment to avoid spawning worker threads
  // Check both the validated env and process.env (in case vitest sets it after module load)
  const isTestEnv = env.NODE_ENV === 'test' || process.env['NODE_ENV'] === 'test' || process.env['VITEST'] === 'true';

  if (env.LOGGER_CONSOLE_ENABLED && !isTestEnv) {
    if (env.NODE_ENV === 'development') {
      transportTargets.push({
        level: 'trace',
        options: {
          ignore: 'pid,hostname,category,categoryLabel,service,environment',
        },
        target: 'pino-pretty',
      });
    } else {
      // Pure JSON on stdout for log processors
      transportTargets.push({
        level: 'trace',
        options: {
          destination: 1,
        },
        target: 'pino/file',
      });
    }
  }

  if (env.LOGGER_FILE_LOG_ENABLED && !isTestEnv) {
    transportTargets.push({
      level: 'trace',
      options: {
        destination: `./${env.LOGGER_FILE_LOG_DIRNAME}/${env.LOGGER_FILE_LOG_FILENAME}`,
        mkdir: true,
      },
      target: 'pino/file',
    });
  }

  const pinoConfig: pino.LoggerOptions = {
    base: {
      environment: env.NODE_ENV,
      hostname: os.hostname(),
      pid: process.pid,
      service: env.LOGGER_SERVICE_NAME,
    },
    level: currentLevel(),
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (overrides.destination) {
    return pino.pino(pinoConfig, overrides.destination);
  }

  // In test mode, use a noop stream to completely suppress all output
  if (isTestEnv || transportTargets.length === 0) {
    const noopStream = new Writable({
      write(_chunk, _encoding, callback) {
        callback();
      },
    });
    return pino.pino(pinoConfig, noopStream);
  }

  pinoConfig.transport = { targets: transportTargets };
  return pino.pino(pinoConfig);
}

/**
 * Internal: get or create the underlying pino logger for a category.
 * Callers should prefer the proxy returned by getLogger below so
 * reconfiguration (configureLogger) is respected even for previously
 * created loggers.
 */
function getOrCreateCategoryLogger(category: string): Logger {
  const cached = loggerCache.get(category);
  if (cached) return cached;

  if (!rootLogger) {
    rootLogger = createRootLogger();
  }

  const categoryLogger = rootLogger.child(
    {
      category,
      categoryLabel: formatLabel(category, 25),
    },
    { level: currentLevel() }
  );

  loggerCache.set(category, categoryLogger);

  return categoryLogger;
}

/**
 * Returns a category logger that stays in sync with reconfiguration.
 *
 * We return a Proxy that looks up the latest underlying pino logger on every
 * property access, so modules that create loggers at top-level pick up
 * `configureLogger(...)` calls made afterwards.
 */
export const getLogger = (category: string): Logger => {
  return new Proxy({} as Logger, {
    get: (_target, prop) => {
      const logger = getOrCreateCategoryLogger(category);
      const value = logger[prop as keyof Logger];
      return typeof value === 'function' ? value.bind(logger) : value;
    },
  });
};

/**
 * Replace the destination or level at runtime.
 * Resets cached loggers so the new configuration applies immediately.
 */
export function configureLogger(next: LoggerOverrides): void {
  overrides = { ...overrides, ...next };
  rootLogger = undefined;
  loggerCache.clear();
}

/**
 * Drop runtime overrides and return to the env-driven configuration.
 */
export function resetLogger(): void {
  overrides = {};
  rootLogger = undefined;
  loggerCache.clear();
}
