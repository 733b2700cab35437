import { generateCacheKey, type CacheKeyValue } from "./cacheKeyGenerator";

export const RedisKeys = {
  // outside the dashboard:* namespace so pattern deletes keep it
  DASHBOARD_GENERATION: () => "generation:dashboard",
  DASHBOARD_COUNTS: (generation: number) => generateCacheKey("dashboard:counts", { gen: generation }),
  DASHBOARD_TIMESERIES: (generation: number, query: Record<string, CacheKeyValue> = {}) =>
    generateCacheKey("dashboard:timeseries", { ...query, gen: generation }),
};

export const RedisPatterns = {
  DASHBOARD_ALL: () => "dashboard:*",
};
