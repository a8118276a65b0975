import { z } from 'zod';
import dotenv from 'dotenv';
import { ValidationException } from '../utils/exceptions';

// Load environment variables
dotenv.config();

const intWithDefault = (fallback: number) =>
  z
    .string()
    .optional()
    .transform((val) => (val ? parseInt(val, 10) : fallback))
    .pipe(z.number().int().nonnegative());

// Comma-separated provider names, highest priority first
const providerList = z
  .string()
  .optional()
  .transform((val) =>
    val
      ? val
          .split(',')
          .map((name) => name.trim())
          .filter((name) => name.length > 0)
      : undefined
  );

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Logging
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),

  // Historical archive. Without it the historical provider is not wired.
  DATABASE_URL: z.string().min(1).optional(),
  DB_POOL_SIZE: intWithDefault(10),

  // Redis response cache
  REDIS_HOST: z.string().optional(),
  REDIS_PORT: z.string().optional(),
  REDIS_PASSWORD: z.string().optional(),
  REDIS_DB: z.string().optional(),
  CACHE_TTL_SECONDS: intWithDefault(86400),

  // Season boundary between the archive and the live site
  HISTORICAL_CUTOFF_YEAR: intWithDefault(2005),

  // Live sources
  LEAGUE_SITE_BASE_URL: z.string().url().default('https://npb.jp'),
  LEAGUE_SITE_MIN_DELAY_MS: intWithDefault(500),
  REFERENCE_SITE_BASE_URL: z.string().url().default('https://www.baseball-reference.com'),
  REFERENCE_SITE_MIN_DELAY_MS: intWithDefault(3000),
  HTTP_TIMEOUT_MS: intWithDefault(30000),
  HTTP_MAX_RETRIES: intWithDefault(2),

  // Aggregator priorities
  PROVIDER_PRIORITY_SEARCH: providerList,
  PROVIDER_PRIORITY_STATS: providerList,
  PROVIDER_PRIORITY_TEAMS: providerList,
  PROVIDER_PRIORITY_ROSTER: providerList,
  PROVIDER_PRIORITY_STANDINGS: providerList,
});

/**
 * Validate a set of environment variables.
 * Exported separately from `env` so configuration can be checked without
 * touching process.env.
 */
export const parseEnv = (source: NodeJS.ProcessEnv = process.env) => {
  try {
    return envSchema.parse(source);
  } catch (error) {
    if (error instanceof z.ZodError) {
      console.error('❌ Environment validation failed:');
      error.issues.forEach((issue) => {
        console.error(`  - ${issue.path.join('.')}: ${issue.message}`);
      });
      throw new ValidationException('Invalid environment configuration');
    }
    throw error;
  }
};

// Export validated environment variables
export const env = parseEnv();

// Type for environment variables
export type Env = z.infer<typeof envSchema>;
