import { PoolConfig } from 'pg';
import { env, Env } from './env.config';
import { logger } from './logger.config';

type DatabaseSettings = Pick<Env, 'DB_POOL_SIZE' | 'NODE_ENV'>;

/**
 * Pool settings for the historical archive. Archive queries are short reads,
 * so a statement that runs past 30 s is cut off.
 */
export function getDatabaseConfig(
  connectionString = env.DATABASE_URL,
  settings: DatabaseSettings = env
): PoolConfig {
  const config: PoolConfig = {
    connectionString,
    max: settings.DB_POOL_SIZE,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 5000,
    statement_timeout: 30000,
    application_name: 'npb-stats-gateway',
  };

  // Hosted Postgres commonly presents self-signed certificates.
  // Set DATABASE_SSL_REJECT_UNAUTHORIZED=true when proper CA certificates exist.
  if (settings.NODE_ENV === 'production') {
    const rejectUnauthorized = process.env.DATABASE_SSL_REJECT_UNAUTHORIZED === 'true';
    config.ssl = { rejectUnauthorized };

    if (!rejectUnauthorized) {
      logger.warn('Database SSL certificate validation is disabled');
    }
  }

  return config;
}
