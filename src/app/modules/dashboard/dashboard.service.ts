import { logger } from "@/config/logger";
import type { CacheClient } from "@/config/redis";
import { handleStoreError } from "@/errors";
import { ApiError } from "@/interface";
import { CacheTTL } from "@/utils/cacheTTL";
import { parseWith } from "@/utils/parseWith";
import { RedisKeys } from "@/utils/redisKeys";
import type { QueryStore } from "../query/query.interface";
import { bucketLabel, shiftBucket, startOfBucket } from "./dashboard.buckets";
import type { DashboardCounts, DashboardOverview, RecentQuery, SeriesPoint } from "./dashboard.interface";
import { timeseriesValidation } from "./dashboard.validation";

const CONTEXT = "DASHBOARD";
const RECENT_LIMIT = 10;

const describe = (err: unknown) => (err instanceof Error ? err.message : String(err));

export interface DashboardServiceDeps {
  queries: Pick<QueryStore, "countByStatus" | "countCreatedSince" | "recent">;
  cache: CacheClient;
  clock?: () => Date;
}

export const createDashboardService = ({ queries, cache, clock = () => new Date() }: DashboardServiceDeps) => {
  const fromStore = async <T>(op: () => Promise<T>): Promise<T> => {
    try {
      return await op();
    } catch (err) {
      if (err instanceof ApiError) throw err;
      throw handleStoreError(err, CONTEXT);
    }
  };

  // the cache is an accelerator only: any failure falls through to the store
  const cached = async <T>(keyFor: (generation: number) => string, load: () => Promise<T>): Promise<T> => {
    let key: string | null = null;
    try {
      // a slow load stores under the generation it started in, so a concurrent invalidation wins
      const generation = await cache.get<unknown>(RedisKeys.DASHBOARD_GENERATION());
      key = keyFor(typeof generation === "number" ? generation : 0);
      const hit = await cache.get<T>(key);
      if (hit !== null) return hit;
    } catch (err) {
      logger.warn(`[${CONTEXT}] Cache read failed: ${describe(err)}`);
      key = null;
    }
    const value = await fromStore(load);
    if (key === null) return value;
    try {
      await cache.set(key, value, CacheTTL.DASHBOARD);
    } catch (err) {
      logger.warn(`[${CONTEXT}] Cache write failed for ${key}: ${describe(err)}`);
    }
    return value;
  };

  const counts = (): Promise<DashboardCounts> =>
    cached(RedisKeys.DASHBOARD_COUNTS, async () => {
      const byStatus = await queries.countByStatus();
      return {
        total: byStatus.pending + byStatus["in-progress"] + byStatus.resolved,
        pending: byStatus.pending,
        inProgress: byStatus["in-progress"],
        resolved: byStatus.resolved,
      };
    });

  /**
   * Submissions per bucket for the `buckets` most recent UTC buckets, oldest
   * first, ending with the bucket that contains now. Empty buckets count 0.
   */
  const timeseries = async (params: unknown = {}): Promise<SeriesPoint[]> => {
    const { granularity, buckets } = parseWith(timeseriesValidation, params, CONTEXT);
    const current = startOfBucket(clock(), granularity);
    const first = shiftBucket(current, granularity, -(buckets - 1));
    // keyed by the current bucket so a cached series never spans a stale window
    const until = bucketLabel(current, granularity);

    return cached((generation) => RedisKeys.DASHBOARD_TIMESERIES(generation, { granularity, buckets, until }), async () => {
      const rows = await queries.countCreatedSince(first, granularity);
      const byLabel = new Map<string, number>();
      for (const row of rows) {
        const label = bucketLabel(startOfBucket(row.start, granularity), granularity);
        byLabel.set(label, (byLabel.get(label) ?? 0) + row.count);
      }
      return Array.from({ length: buckets }, (_, i) => {
        const date = bucketLabel(shiftBucket(first, granularity, i), granularity);
        return { date, count: byLabel.get(date) ?? 0 };
      });
    });
  };

  const recent = async (): Promise<RecentQuery[]> => {
    const items = await fromStore(() => queries.recent(RECENT_LIMIT));
    return items.map(({ id, requesterName, requesterEmail, status, createdAt }) => ({
      id,
      requesterName,
      requesterEmail,
      status,
      createdAt,
    }));
  };

  const overview = async (params: unknown = {}): Promise<DashboardOverview> => {
    const [c, series, latest] = await Promise.all([counts(), timeseries(params), recent()]);
    return { counts: c, timeseries: series, recent: latest };
  };

  return { counts, timeseries, overview };
};

export type DashboardService = ReturnType<typeof createDashboardService>;
