export {
  configureLogger,
  flushLoggers,
  getLogger,
  getLoggerConfig,
  type Logger,
  type LoggerRuntimeConfig,
} from './pino-logger.js';
export { LOG_LEVELS, LogLevelSchema, type LogLevel, type LoggerEnvConfig, validateLoggerEnv } from './env.schema.js';
