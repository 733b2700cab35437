import type { QueryStatus, TimeGranularity } from "../query/query.interface";

export interface DashboardCounts {
  total: number;
  pending: number;
  inProgress: number;
  resolved: number;
}

export interface SeriesPoint {
  /** `YYYY-MM-DD` for day and week buckets, `YYYY-MM` for months. */
  date: string;
  count: number;
}

export interface RecentQuery {
  id: string;
  requesterName: string;
  requesterEmail: string;
  status: QueryStatus;
  createdAt: Date;
}

export interface DashboardOverview {
  counts: DashboardCounts;
  timeseries: SeriesPoint[];
  recent: RecentQuery[];
}

export type { TimeGranularity };
