import path from 'node:path';

import { z } from 'zod';

const envSchema = z.object({
  ZENTITY_DATABASE_PATH: z.string().trim().min(1).or(z.undefined()),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

type ValidatedEnv = z.infer<typeof envSchema>;

let validatedEnv: ValidatedEnv | undefined;

/**
 * Parse an environment record against the schema.
 * @throws Error listing every invalid variable
 */
export function parseEnv(env: NodeJS.ProcessEnv): ValidatedEnv {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const errors = result.error.issues.map((e) => `  - ${e.path.join('.')}: ${e.message}`).join('\n');
    throw new Error(`Environment validation failed:\n${errors}`);
  }
  return result.data;
}

/**
 * Validates process.env on first access and caches the result.
 */
function validateEnv(): ValidatedEnv {
  if (!validatedEnv) {
    validatedEnv = parseEnv(process.env);
  }
  return validatedEnv;
}

/**
 * Forget the cached environment so the next access re-reads process.env.
 */
export function resetEnvCache(): void {
  validatedEnv = undefined;
}

/**
 * Path of the SQLite database file.
 *
 * Priority:
 * 1. ZENTITY_DATABASE_PATH (may be ':memory:')
 * 2. process.cwd() + '/data/zentity.db'
 */
export function getDatabasePath(): string {
  const env = validateEnv();
  return env.ZENTITY_DATABASE_PATH ?? path.join(process.cwd(), 'data', 'zentity.db');
}

export function getNodeEnv(): ValidatedEnv['NODE_ENV'] {
  return validateEnv().NODE_ENV;
}
