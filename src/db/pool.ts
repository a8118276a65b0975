import { Pool, QueryResult, QueryResultRow } from 'pg';
import { getDatabaseConfig } from '../config/database.config';
import { logger } from '../config/logger.config';

// Slow query thresholds in milliseconds
const SLOW_QUERY_THRESHOLD_MS = parseInt(process.env.SLOW_QUERY_THRESHOLD_MS || '200', 10);
const VERY_SLOW_QUERY_THRESHOLD_MS = parseInt(process.env.VERY_SLOW_QUERY_THRESHOLD_MS || '1000', 10);

/**
 * Create the archive's connection pool. Callers own it and end it with
 * closePool.
 */
export function createPool(connectionString?: string): Pool {
  const pool = new Pool(getDatabaseConfig(connectionString));

  pool.on('connect', () => {
    logger.debug('Database client connected');
  });

  pool.on('error', (err: Error) => {
    logger.error('Unexpected database error', { error: err.message });
  });

  return pool;
}

function logSlowQuery(duration: number, queryText: string, label?: string): void {
  if (duration <= SLOW_QUERY_THRESHOLD_MS) return;

  const logData = {
    durationMs: duration,
    query: queryText.substring(0, 200),
    label,
  };

  if (duration > VERY_SLOW_QUERY_THRESHOLD_MS) {
    logger.error('Very slow query detected', logData);
  } else {
    logger.warn('Slow query detected', logData);
  }
}

/**
 * pool.query with slow-query logging.
 */
export async function timedQuery<R extends QueryResultRow>(
  db: Pool,
  text: string,
  params: unknown[] = [],
  label?: string
): Promise<QueryResult<R>> {
  const start = Date.now();
  try {
    return await db.query<R>(text, params);
  } finally {
    logSlowQuery(Date.now() - start, text, label);
  }
}

export async function closePool(pool: Pool): Promise<void> {
  pool.removeAllListeners();
  await pool.end();
  logger.info('Database pool closed');
}
