import Redis, { RedisOptions } from 'ioredis';
import { env, Env } from './env.config';
import { logger } from './logger.config';

type RedisSettings = Pick<Env, 'REDIS_HOST' | 'REDIS_PORT' | 'REDIS_PASSWORD' | 'REDIS_DB'>;

/**
 * Connection options for the response cache. The client connects on first
 * command and gives up on a command after three reconnect attempts, so a
 * missing Redis turns into cache misses rather than stalled lookups.
 */
export function redisOptions(config: RedisSettings): RedisOptions {
  return {
    host: config.REDIS_HOST || 'localhost',
    port: parseInt(config.REDIS_PORT || '6379', 10),
    password: config.REDIS_PASSWORD || undefined,
    db: parseInt(config.REDIS_DB || '0', 10),
    maxRetriesPerRequest: 3,
    lazyConnect: true,
  };
}

let redisClient: Redis | null = null;

export function getRedisClient(): Redis {
  if (!redisClient) {
    const options = redisOptions(env);
    redisClient = new Redis(options);
    redisClient.on('error', (err: Error) => logger.error('Redis error', { error: err.message }));
    redisClient.on('connect', () => logger.info('Redis connected', { host: options.host, db: options.db }));
  }
  return redisClient;
}

export async function closeRedis(): Promise<void> {
  if (redisClient) {
    await redisClient.quit();
    redisClient = null;
  }
}
