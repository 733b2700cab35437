import type { TimeGranularity } from "../query/query.interface";

const DAY_MS = 24 * 60 * 60 * 1000;

/** UTC start of the bucket containing `date`; weeks start on Monday. */
export const startOfBucket = (date: Date, granularity: TimeGranularity): Date => {
  const y = date.getUTCFullYear();
  const m = date.getUTCMonth();
  const d = date.getUTCDate();
  switch (granularity) {
    case "day":
      return new Date(Date.UTC(y, m, d));
    case "week": {
      const sinceMonday = (date.getUTCDay() + 6) % 7;
      return new Date(Date.UTC(y, m, d) - sinceMonday * DAY_MS);
    }
    case "month":
      return new Date(Date.UTC(y, m, 1));
  }
};

export const shiftBucket = (start: Date, granularity: TimeGranularity, steps: number): Date => {
  switch (granularity) {
    case "day":
      return new Date(start.getTime() + steps * DAY_MS);
    case "week":
      return new Date(start.getTime() + steps * 7 * DAY_MS);
    case "month":
      return new Date(Date.UTC(start.getUTCFullYear(), start.getUTCMonth() + steps, 1));
  }
};

export const bucketLabel = (start: Date, granularity: TimeGranularity): string =>
  granularity === "month" ? start.toISOString().slice(0, 7) : start.toISOString().slice(0, 10);
