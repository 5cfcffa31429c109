/**
 * Application configuration
 *
 * Loads and validates environment variables
 */

import { validateEnv, type AppEnv } from '@pairmatch/core';

export const SERVICE_VERSION = '1.0.0';

export interface AppConfig {
  env: AppEnv['NODE_ENV'];
  isProd: boolean;
  server: {
    port: number;
    host: string;
  };
  logger: {
    level: AppEnv['LOG_LEVEL'];
  };
  service: {
    name: string;
    version: string;
  };
  database: {
    url: string | undefined;
    poolMax: number;
  };
  scoring: {
    cacheEnabled: boolean;
    autoScoringEnabled: boolean;
    maxBatchSize: number;
  };
  /** Allowed CORS origins; false disables CORS */
  corsOrigins: string[] | false;
}

/**
 * Parse CORS_ORIGIN (comma-separated). Wildcards are refused.
 */
export function parseCorsOrigins(value: string | undefined): string[] | false {
  if (!value) return false;

  const origins = value
    .split(',')
    .map((origin) => origin.trim())
    .filter(Boolean);

  for (const origin of origins) {
    if (origin === '*' || !URL.canParse(origin)) {
      throw new Error(`Invalid CORS origin: ${origin}`);
    }
  }

  return origins.length > 0 ? origins : false;
}

/**
 * Build the application config; throws ValidationError on bad input
 */
export function loadConfig(source: Record<string, string | undefined> = process.env): AppConfig {
  const env = validateEnv(source);

  return {
    env: env.NODE_ENV,
    isProd: env.NODE_ENV === 'production',
    server: {
      port: env.PORT,
      host: env.HOST,
    },
    logger: {
      level: env.LOG_LEVEL,
    },
    service: {
      name: env.SERVICE_NAME,
      version: SERVICE_VERSION,
    },
    database: {
      url: env.DATABASE_URL,
      poolMax: env.DATABASE_POOL_MAX,
    },
    scoring: {
      cacheEnabled: env.SCORING_CACHE_ENABLED,
      autoScoringEnabled: env.SCORING_AUTO_SCORING_ENABLED,
      maxBatchSize: env.SCORING_MAX_BATCH_SIZE,
    },
    corsOrigins: parseCorsOrigins(source.CORS_ORIGIN),
  };
}
