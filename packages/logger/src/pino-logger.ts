import pino from 'pino';

import { type LogLevel, validateLoggerEnv } from './env.schema.js';

const env = validateLoggerEnv(process.env);

export type Logger = pino.Logger;

export interface LoggerRuntimeConfig {
  level: LogLevel;
  pretty: boolean;
  /** Explicit destination; overrides the stderr and test defaults */
  destination?: pino.DestinationStream | undefined;
}

const loggerCache = new Map<string, Logger>();

let rootLogger: Logger | undefined;

// Mutable so the CLI can apply --log-level after modules created their loggers
let runtimeConfig: LoggerRuntimeConfig = {
  level: env.LOGGER_LOG_LEVEL,
  pretty: env.LOGGER_PRETTY,
};

const noopDestination: pino.DestinationStream = {
  write: () => undefined,
};

function isTestEnvironment(): boolean {
  // vitest may set these after module load
  return env.NODE_ENV === 'test' || process.env['NODE_ENV'] === 'test' || process.env['VITEST'] === 'true';
}

/**
 * Creates and configures the root logger instance.
 */
function createRootLogger(): Logger {
  const options: pino.LoggerOptions = {
    base: {
      environment: env.NODE_ENV,
      pid: process.pid,
      service: env.LOGGER_SERVICE_NAME,
    },
    level: runtimeConfig.level,
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (runtimeConfig.destination) {
    return pino.pino(options, runtimeConfig.destination);
  }

  if (isTestEnvironment()) {
    return pino.pino(options, noopDestination);
  }

  // stdout carries the account snapshot, so every log target writes to stderr
  if (runtimeConfig.pretty) {
    return pino.pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          destination: 2,
          ignore: 'pid,hostname,service,environment',
        },
      },
    });
  }

  return pino.pino(options, pino.destination(2));
}

function getOrCreateCategoryLogger(category: string): Logger {
  const cached = loggerCache.get(category);
  if (cached) return cached;

  if (!rootLogger) {
    rootLogger = createRootLogger();
  }

  const categoryLogger = rootLogger.child({ category });
  loggerCache.set(category, categoryLogger);
  return categoryLogger;
}

/**
 * Returns a category logger that stays in sync with runtime reconfiguration.
 *
 * Modules create their loggers at load time, before the CLI has parsed its
 * options, so the returned Proxy resolves the current underlying logger on every
 * property access.
 */
export const getLogger = (category: string): Logger => {
  return new Proxy({} as Logger, {
    get: (_target, prop) => {
      const logger = getOrCreateCategoryLogger(category);
      const value: unknown = Reflect.get(logger, prop);
      return typeof value === 'function' ? value.bind(logger) : value;
    },
  });
};

/**
 * Update level, pretty printing or destination at runtime.
 * Resets cached loggers so the new configuration applies immediately.
 */
export function configureLogger(next: Partial<LoggerRuntimeConfig>): void {
  runtimeConfig = { ...runtimeConfig, ...next };
  rootLogger = undefined;
  loggerCache.clear();
}

export function getLoggerConfig(): Readonly<LoggerRuntimeConfig> {
  return runtimeConfig;
}

export function flushLoggers(): void {
  rootLogger?.flush();
}
