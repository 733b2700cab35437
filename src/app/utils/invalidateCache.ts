import type { CacheClient } from '@/config/redis';
import { logger } from '@/config/logger';
import { RedisKeys, RedisPatterns } from '@/utils/redisKeys';

type MaybeString = string | undefined | null;

async function invalidateMany(
  cache: CacheClient,
  {
    keys = [],
    patterns = [],
  }: {
    keys?: Array<MaybeString>;
    patterns?: Array<MaybeString>;
  }
) {
  const keyDeletes = keys
    .filter((k): k is string => Boolean(k))
    .map((k) => cache.delete(k));
  const patternDeletes = patterns
    .filter((p): p is string => Boolean(p))
    .map((p) => cache.deleteByPattern(p));

  await Promise.all([...keyDeletes, ...patternDeletes]);
}

/**
 * Drops every cached dashboard aggregate. Called after any query mutation;
 * a cache outage is logged, the mutation itself already succeeded.
 *
 * The generation bump comes first: a dashboard read that loaded before it
 * writes under the old generation's key, which no later read looks up.
 */
export async function invalidateDashboardCaches(cache: CacheClient) {
  try {
    await cache.increment(RedisKeys.DASHBOARD_GENERATION());
    await invalidateMany(cache, { patterns: [RedisPatterns.DASHBOARD_ALL()] });
  } catch (error) {
    logger.warn(`[Redis] Failed to invalidate dashboard caches: ${error instanceof Error ? error.message : String(error)}`);
  }
}
