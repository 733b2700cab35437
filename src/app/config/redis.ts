import { createClient } from 'redis';
import config from './index';
import { logger } from './logger';
import { CacheTTL } from '../utils/cacheTTL';

const client = createClient({
  url: config.REDIS_URL,
  socket: {
    connectTimeout: 5000,
    reconnectStrategy: (retries) => (retries > 5 ? new Error('Redis unreachable') : Math.min(retries * 200, 2000)),
  },
});

client.on('connect', () => logger.info('[Redis] Connecting...'));
client.on('ready', () => logger.info('[Redis] Connected successfully.'));
client.on('error', (err: Error) => logger.error(`[Redis] Connection error: ${err.message}`));
client.on('end', () => logger.info('[Redis] Connection closed.'));

const DEFAULT_TTL = CacheTTL.DEFAULT;

/**
 * The subset of cache operations the services rely on. The Redis-backed
 * `redis` object below implements it; tests pass an in-memory one.
 */
export interface CacheClient {
  get<T>(key: string): Promise<T | null>;
  set<T>(key: string, value: T, ttl?: number): Promise<boolean>;
  delete(key: string): Promise<boolean>;
  deleteByPattern(pattern: string): Promise<void>;
  /** Atomically adds one to a counter key (starting from 0) and returns the new value. */
  increment(key: string): Promise<number>;
}

export const redis = {
  async connect() {
    if (!client.isOpen) await client.connect();
  },
  async quit() {
    if (client.isOpen)
      await client.quit();
  },
  async get<T>(key: string): Promise<T | null> {
    await this.connect();
    const data = await client.get(key);
    if (!data) {
      logger.debug(`[Redis] CACHE MISS for key: ${key}`);
      return null;
    }
    logger.debug(`[Redis] CACHE HIT for key: ${key}`);
    try {
      return JSON.parse(data) as T;
    } catch (err) {
      logger.error(`[Redis] JSON parse error for key: ${key}: ${err instanceof Error ? err.message : String(err)}`);
      return null;
    }
  },

  async set<T>(key: string, value: T, ttl: number = DEFAULT_TTL): Promise<boolean> {
    await this.connect();
    const result = await client.set(key, JSON.stringify(value), { EX: ttl });
    return result === 'OK';
  },

  async delete(key: string): Promise<boolean> {
    await this.connect();
    const result = await client.del(key);
    return result > 0;
  },

  async increment(key: string): Promise<number> {
    await this.connect();
    return client.incr(key);
  },

  async deleteByPattern(pattern: string): Promise<void> {
    await this.connect();
    let cursor = '0';
    let totalDeleted = 0;
    do {
      const { cursor: nextCursor, keys } = await client.scan(cursor, {
        MATCH: pattern,
        COUNT: 500,
      });
      cursor = nextCursor;

      if (keys.length > 0) {
        totalDeleted += Number(await client.del(keys));
      }
    } while (cursor !== '0');

    logger.debug(`[Redis] Total keys deleted for pattern "${pattern}": ${totalDeleted}`);
  },
};
