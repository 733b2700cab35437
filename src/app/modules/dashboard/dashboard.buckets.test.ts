import { describe, expect, it } from "vitest";
import { bucketLabel, shiftBucket, startOfBucket } from "./dashboard.buckets";

describe("dashboard buckets", () => {
  it("truncates to the UTC day", () => {
    expect(startOfBucket(new Date("2026-03-11T23:59:59.999Z"), "day")).toEqual(new Date("2026-03-11T00:00:00.000Z"));
  });

  it("starts weeks on Monday", () => {
    expect(startOfBucket(new Date("2026-03-15T23:00:00.000Z"), "week")).toEqual(new Date("2026-03-09T00:00:00.000Z"));
    expect(startOfBucket(new Date("2026-03-09T00:00:00.000Z"), "week")).toEqual(new Date("2026-03-09T00:00:00.000Z"));
  });

  it("shifts months across a year boundary", () => {
    const start = startOfBucket(new Date("2026-01-20T12:00:00.000Z"), "month");
    expect(bucketLabel(shiftBucket(start, "month", -1), "month")).toBe("2025-12");
  });

  it("labels days and weeks by date and months by year-month", () => {
    const start = new Date("2026-03-09T00:00:00.000Z");
    expect(bucketLabel(start, "day")).toBe("2026-03-09");
    expect(bucketLabel(start, "week")).toBe("2026-03-09");
    expect(bucketLabel(start, "month")).toBe("2026-03");
  });
});
