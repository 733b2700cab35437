export const QUERY_STATUSES = ["pending", "in-progress", "resolved"] as const;

export type QueryStatus = (typeof QUERY_STATUSES)[number];

export interface IQuery {
  id: string;
  requesterName: string;
  requesterEmail: string;
  /** Student id of an authenticated requester; null for guests. */
  requesterIdentity: string | null;
  category: string | null;
  message: string;
  status: QueryStatus;
  adminResponse: string | null;
  adminReplyAt: Date | null;
  adminReplySeen: boolean;
  createdAt: Date;
  updatedAt: Date;
  resolvedAt: Date | null;
}

export interface NewQuery {
  requesterName: string;
  requesterEmail: string;
  requesterIdentity: string | null;
  category: string | null;
  message: string;
}

/** The only fields a stored query may change after creation. */
export type QueryPatch = Partial<
  Pick<IQuery, "status" | "adminResponse" | "resolvedAt" | "adminReplyAt" | "adminReplySeen">
>;

export type RequesterType = "student" | "guest";

export interface QueryFilter {
  status?: QueryStatus;
  category?: string;
  searchText?: string;
  requesterType?: RequesterType;
}

export interface Pagination {
  page: number;
  limit: number;
}

export type QuerySortField = "createdAt" | "updatedAt" | "resolvedAt";

export interface QueryOrdering {
  sortBy: QuerySortField;
  order: "asc" | "desc";
}

export interface QueryPage {
  items: IQuery[];
  total: number;
  page: number;
  limit: number;
  totalPages: number;
}

export type Requester = { identity: string } | { email: string };

export type TimeGranularity = "day" | "week" | "month";

export interface CreatedBucket {
  /** UTC start of the bucket. */
  start: Date;
  count: number;
}

export type StatusCounts = Record<QueryStatus, number>;

export interface QueryStore {
  create(input: NewQuery): Promise<IQuery>;
  findById(id: string): Promise<IQuery | null>;
  list(filter: QueryFilter, pagination: Pagination, ordering: QueryOrdering): Promise<{ items: IQuery[]; total: number }>;
  update(id: string, patch: QueryPatch): Promise<IQuery | null>;
  delete(id: string): Promise<boolean>;
  listByRequester(requester: Requester): Promise<IQuery[]>;
  markRepliesSeen(ids: string[]): Promise<void>;
  countByStatus(): Promise<StatusCounts>;
  countCreatedSince(since: Date, granularity: TimeGranularity): Promise<CreatedBucket[]>;
  recent(limit: number): Promise<IQuery[]>;
}

export interface QueryResponseEvent {
  query: IQuery;
  previousResponse: string | null;
}

/** Told about every change of an admin response; delivery is its own concern. */
export interface QueryNotifier {
  responseChanged(event: QueryResponseEvent): Promise<void>;
}
