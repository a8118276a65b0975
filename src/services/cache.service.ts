import { createHash } from 'crypto';
import Redis from 'ioredis';
import { getRedisClient } from '../config/redis.config';
import { logger } from '../config/logger.config';

/**
 * Response cache collaborator. A failing backend behaves as a miss.
 */
export interface CacheStore {
  get<T>(key: string): Promise<T | null>;
  set(key: string, value: unknown, ttlSeconds: number): Promise<void>;
}

/**
 * Deterministic key for one provider call: md5 of "operation|arg1|arg2...".
 * Undefined and null arguments are written as empty strings.
 */
export function cacheKey(operation: string, args: readonly unknown[]): string {
  const parts = [operation, ...args.map((arg) => (arg === undefined || arg === null ? '' : String(arg)))];
  return createHash('md5').update(parts.join('|')).digest('hex');
}

export class CacheService implements CacheStore {
  constructor(
    private readonly prefix = 'npb:',
    private readonly client: () => Redis = getRedisClient
  ) {}

  async get<T>(key: string): Promise<T | null> {
    try {
      const redis = this.client();
      const data = await redis.get(this.prefix + key);
      return data ? JSON.parse(data) : null;
    } catch (error) {
      logger.warn('Cache get failed', { key, error });
      return null;
    }
  }

  async set(key: string, value: unknown, ttlSeconds = 86400): Promise<void> {
    try {
      const redis = this.client();
      await redis.setex(this.prefix + key, ttlSeconds, JSON.stringify(value));
    } catch (error) {
      logger.warn('Cache set failed', { key, error });
    }
  }
}
