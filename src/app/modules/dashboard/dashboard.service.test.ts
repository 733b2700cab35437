import { beforeEach, describe, expect, it } from "vitest";
import { ErrorCode } from "@/interface";
import type { NewQuery, QueryStatus } from "../query/query.interface";
import { invalidateDashboardCaches } from "@/utils/invalidateCache";
import { createDashboardService } from "./dashboard.service";
import { MemoryQueryStore } from "../../../test/memoryQueryStore";
import { MemoryCache } from "../../../test/memoryCache";
import { expectApiError } from "../../../test/expectApiError";

// a Wednesday
const now = new Date("2026-03-11T15:00:00.000Z");

const base: NewQuery = {
  requesterName: "Asha",
  requesterEmail: "asha@example.com",
  requesterIdentity: null,
  category: null,
  message: "Fee?",
};

const setup = () => {
  const queries = new MemoryQueryStore(() => now);
  const cache = new MemoryCache();
  const service = createDashboardService({ queries, cache, clock: () => now });
  const at = (iso: string, status: QueryStatus = "pending") => queries.insert({ ...base, status, createdAt: new Date(iso) });
  return { service, queries, cache, at };
};

type Setup = ReturnType<typeof setup>;

describe("dashboard counts", () => {
  let ctx: Setup;
  beforeEach(() => {
    ctx = setup();
  });

  it("counts every query by status", async () => {
    ctx.at("2026-03-01T00:00:00.000Z", "pending");
    ctx.at("2026-03-02T00:00:00.000Z", "pending");
    ctx.at("2026-03-03T00:00:00.000Z", "in-progress");
    ctx.at("2025-01-03T00:00:00.000Z", "resolved");

    expect(await ctx.service.counts()).toEqual({ total: 4, pending: 2, inProgress: 1, resolved: 1 });
  });

  it("returns zeros for an empty store", async () => {
    expect(await ctx.service.counts()).toEqual({ total: 0, pending: 0, inProgress: 0, resolved: 0 });
  });

  it("serves repeat reads from the cache", async () => {
    ctx.at("2026-03-01T00:00:00.000Z");
    await ctx.service.counts();
    ctx.at("2026-03-02T00:00:00.000Z");

    expect((await ctx.service.counts()).total).toBe(1);
    expect(ctx.cache.entries.get("dashboard:counts?gen=0")).toBe('{"total":1,"pending":1,"inProgress":0,"resolved":0}');
  });

  it("does not let a read that started before an invalidation repopulate the cache", async () => {
    let release: () => void = () => {};
    const held = new Promise<void>((resolve) => {
      release = resolve;
    });
    let markLoaded: () => void = () => {};
    const loaded = new Promise<void>((resolve) => {
      markLoaded = resolve;
    });
    const slow = createDashboardService({
      queries: {
        countByStatus: async () => {
          const byStatus = await ctx.queries.countByStatus();
          markLoaded();
          await held;
          return byStatus;
        },
        countCreatedSince: (since, granularity) => ctx.queries.countCreatedSince(since, granularity),
        recent: (limit) => ctx.queries.recent(limit),
      },
      cache: ctx.cache,
      clock: () => now,
    });

    const inFlight = slow.counts();
    await loaded;
    ctx.at("2026-03-10T00:00:00.000Z");
    await invalidateDashboardCaches(ctx.cache);
    release();

    expect((await inFlight).total).toBe(0);
    expect(await ctx.service.counts()).toEqual({ total: 1, pending: 1, inProgress: 0, resolved: 0 });
    expect(await slow.counts()).toEqual({ total: 1, pending: 1, inProgress: 0, resolved: 0 });
  });

  it("falls through to the store when the cache is down", async () => {
    ctx.at("2026-03-01T00:00:00.000Z");
    ctx.cache.failWith = new Error("redis down");

    expect((await ctx.service.counts()).total).toBe(1);
  });

  it("reports store failures as unavailable", async () => {
    ctx.queries.failWith = new Error("connection refused");

    await expectApiError(ctx.service.counts(), 503, ErrorCode.STORE_UNAVAILABLE);
  });
});

describe("dashboard timeseries", () => {
  let ctx: Setup;
  beforeEach(() => {
    ctx = setup();
    ctx.at("2025-12-31T23:00:00.000Z");
    ctx.at("2026-01-15T09:00:00.000Z");
    ctx.at("2026-03-08T23:59:00.000Z");
    ctx.at("2026-03-09T00:00:00.000Z");
    ctx.at("2026-03-11T10:00:00.000Z");
    ctx.at("2026-03-11T14:59:00.000Z");
  });

  it("defaults to 30 daily buckets ending today", async () => {
    const series = await ctx.service.timeseries();

    expect(series).toHaveLength(30);
    expect(series[0]).toEqual({ date: "2026-02-10", count: 0 });
    expect(series[29]).toEqual({ date: "2026-03-11", count: 2 });
  });

  it("zero-fills empty days", async () => {
    const series = await ctx.service.timeseries({ granularity: "day", buckets: 30 });

    expect(series.slice(-3)).toEqual([
      { date: "2026-03-09", count: 1 },
      { date: "2026-03-10", count: 0 },
      { date: "2026-03-11", count: 2 },
    ]);
  });

  it("groups Monday-based weeks", async () => {
    const series = await ctx.service.timeseries({ granularity: "week", buckets: "30" });

    expect(series).toHaveLength(30);
    expect(series.slice(-2)).toEqual([
      { date: "2026-03-02", count: 1 },
      { date: "2026-03-09", count: 3 },
    ]);
    expect(series.slice(-12, -2).map((p) => p.count)).toEqual([0, 1, 0, 1, 0, 0, 0, 0, 0, 0]);
  });

  it("groups calendar months", async () => {
    const series = await ctx.service.timeseries({ granularity: "month", buckets: 30 });

    expect(series[0].date).toBe("2023-10");
    expect(series.slice(-4)).toEqual([
      { date: "2025-12", count: 1 },
      { date: "2026-01", count: 1 },
      { date: "2026-02", count: 0 },
      { date: "2026-03", count: 4 },
    ]);
  });

  it("caches under a key naming the current bucket", async () => {
    await ctx.service.timeseries({ granularity: "day", buckets: 30 });

    expect(ctx.cache.entries.has("dashboard:timeseries?buckets=30&gen=0&granularity=day&until=2026-03-11")).toBe(true);
  });

  it("rejects bucket counts outside 30..365 and unknown granularities", async () => {
    await expectApiError(ctx.service.timeseries({ buckets: 29 }), 400, ErrorCode.VALIDATION_ERROR);
    await expectApiError(ctx.service.timeseries({ buckets: 366 }), 400, ErrorCode.VALIDATION_ERROR);
    await expectApiError(ctx.service.timeseries({ granularity: "year" }), 400, ErrorCode.VALIDATION_ERROR);
  });
});

describe("dashboard overview", () => {
  it("combines counts, the series and the ten newest queries", async () => {
    const ctx = setup();
    for (let day = 1; day <= 12; day += 1) {
      ctx.queries.insert({ ...base, requesterName: `Requester ${day}`, createdAt: new Date(Date.UTC(2026, 2, day)) });
    }

    const overview = await ctx.service.overview();

    expect(overview.counts.total).toBe(12);
    expect(overview.timeseries).toHaveLength(30);
    expect(overview.timeseries.slice(-12).map((p) => p.count)).toEqual([0, 1, 1, 1, 1, 1, 1, 1, 1, 1, 1, 1]);
    expect(overview.recent).toHaveLength(10);
    expect(overview.recent[0].requesterName).toBe("Requester 12");
    expect(Object.keys(overview.recent[0]).sort()).toEqual(["createdAt", "id", "requesterEmail", "requesterName", "status"]);
  });
});
