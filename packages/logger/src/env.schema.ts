import { z } from 'zod';

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'silent'] as const;

export const LogLevelSchema = z.enum(LOG_LEVELS);

export type LogLevel = z.infer<typeof LogLevelSchema>;

export const loggerEnvSchema = z.object({
  LOGGER_LOG_LEVEL: LogLevelSchema.default('warn'),
  LOGGER_PRETTY: z
    .string()
    .default('false')
    .transform((val: string) => val === 'true'),
  LOGGER_SERVICE_NAME: z.string().trim().min(1, { message: 'Invalid service name' }).default('payledger'),
  NODE_ENV: z.enum(['production', 'development', 'test']).default('development'),
});

export type LoggerEnvConfig = z.infer<typeof loggerEnvSchema>;

export function validateLoggerEnv(env: NodeJS.ProcessEnv = process.env): LoggerEnvConfig {
  return loggerEnvSchema.parse(env);
}
