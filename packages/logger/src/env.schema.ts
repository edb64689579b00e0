import { z } from 'zod';

import type { LogLevel } from './logger.js';

export const loggerEnvSchema = z.object({
  ZENTITY_LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error']).default('info'),
  ZENTITY_LOG_COLOR: z
    .enum(['true', 'false'])
    .default('false')
    .transform((val) => val === 'true'),
});

export type LoggerEnvConfig = z.infer<typeof loggerEnvSchema>;

/**
 * Validate logger environment variables.
 * @throws Error listing every invalid variable
 */
export function validateLoggerEnv(env: NodeJS.ProcessEnv = process.env): LoggerEnvConfig {
  const result = loggerEnvSchema.safeParse(env);
  if (!result.success) {
    const errors = result.error.issues.map((e) => `  - ${e.path.join('.')}: ${e.message}`).join('\n');
    throw new Error(`Logger environment validation failed:\n${errors}`);
  }
  return result.data;
}

export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  return validateLoggerEnv(env).ZENTITY_LOG_LEVEL;
}

export function resolveLogColor(env: NodeJS.ProcessEnv = process.env): boolean {
  return validateLoggerEnv(env).ZENTITY_LOG_COLOR;
}
