import { z } from 'zod';

import { ValidationError } from './errors.js';

/**
 * Environment Variable Validation
 * Fails at boot time when configuration is malformed
 */

/**
 * "true"/"false" flag with a default when unset
 */
const booleanFlag = (defaultValue: boolean) =>
  z
    .enum(['true', 'false'])
    .optional()
    .transform((value) => (value === undefined ? defaultValue : value === 'true'));

// Base server config
const ServerEnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'staging', 'production']).default('development'),
  PORT: z.coerce.number().int().min(1).max(65535).default(8086),
  HOST: z.string().default('0.0.0.0'),
  LOG_LEVEL: z
    .enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'])
    .default('info'),
  SERVICE_NAME: z.string().min(1).default('pairmatch-scoring'),
});

// PostgreSQL config (in-memory adapters are used when unset)
const DatabaseEnvSchema = z.object({
  DATABASE_URL: z.string().url('DATABASE_URL must be a connection URL').optional(),
  DATABASE_POOL_MAX: z.coerce.number().int().min(1).max(100).default(10),
});

// Scoring behaviour
const ScoringEnvSchema = z.object({
  /** Return a previously stored score for the same pair instead of recomputing */
  SCORING_CACHE_ENABLED: booleanFlag(true),
  /** Score pairs automatically when donor registrations arrive */
  SCORING_AUTO_SCORING_ENABLED: booleanFlag(true),
  SCORING_MAX_BATCH_SIZE: z.coerce.number().int().min(1).max(1000).default(100),
});

export const AppEnvSchema = ServerEnvSchema.merge(DatabaseEnvSchema).merge(ScoringEnvSchema);

export type AppEnv = z.infer<typeof AppEnvSchema>;

/**
 * Validate environment variables
 */
export function validateEnv(source: Record<string, string | undefined> = process.env): AppEnv {
  const result = AppEnvSchema.safeParse(source);

  if (!result.success) {
    throw new ValidationError(
      'Invalid environment configuration',
      result.error.flatten().fieldErrors
    );
  }

  return result.data;
}
