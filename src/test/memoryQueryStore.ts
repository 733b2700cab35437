import { Types } from "mongoose";
import type {
  CreatedBucket,
  IQuery,
  NewQuery,
  Pagination,
  QueryFilter,
  QueryOrdering,
  QueryPatch,
  QueryStore,
  Requester,
  StatusCounts,
  TimeGranularity,
} from "@/modules/query/query.interface";
import { startOfBucket } from "@/modules/dashboard/dashboard.buckets";

const newId = () => new Types.ObjectId().toHexString();

const sortValue = (query: IQuery, field: QueryOrdering["sortBy"]) => query[field]?.getTime() ?? Number.NEGATIVE_INFINITY;

/** In-process QueryStore with the same ordering and filtering rules as the Mongo one. */
export class MemoryQueryStore implements QueryStore {
  readonly rows = new Map<string, IQuery>();
  /** When set, every call rejects with this error. */
  failWith: Error | null = null;

  constructor(private readonly clock: () => Date = () => new Date()) {}

  private check() {
    if (this.failWith) throw this.failWith;
  }

  /** Stores a record as-is, for arranging fixtures with chosen timestamps. */
  insert(fields: NewQuery & Partial<IQuery>): IQuery {
    const now = this.clock();
    const query: IQuery = {
      id: newId(),
      status: "pending",
      adminResponse: null,
      adminReplyAt: null,
      adminReplySeen: false,
      resolvedAt: null,
      createdAt: now,
      updatedAt: now,
      ...fields,
    };
    this.rows.set(query.id, query);
    return { ...query };
  }

  async create(input: NewQuery): Promise<IQuery> {
    this.check();
    return this.insert({ ...input });
  }

  async findById(id: string): Promise<IQuery | null> {
    this.check();
    const found = this.rows.get(id);
    return found ? { ...found } : null;
  }

  async list(filter: QueryFilter, { page, limit }: Pagination, { sortBy, order }: QueryOrdering) {
    this.check();
    const search = filter.searchText?.toLowerCase();
    const matched = [...this.rows.values()].filter((q) => {
      if (filter.status && q.status !== filter.status) return false;
      if (filter.category && q.category !== filter.category) return false;
      if (filter.requesterType === "student" && q.requesterIdentity === null) return false;
      if (filter.requesterType === "guest" && q.requesterIdentity !== null) return false;
      if (search) {
        const haystack = [q.message, q.requesterName, q.requesterEmail].map((s) => s.toLowerCase());
        if (!haystack.some((s) => s.includes(search))) return false;
      }
      return true;
    });
    const direction = order === "asc" ? 1 : -1;
    matched.sort((a, b) => {
      const diff = sortValue(a, sortBy) - sortValue(b, sortBy);
      if (diff !== 0) return diff * direction;
      return a.id.localeCompare(b.id) * direction;
    });
    const start = (page - 1) * limit;
    return { items: matched.slice(start, start + limit).map((q) => ({ ...q })), total: matched.length };
  }

  async update(id: string, patch: QueryPatch): Promise<IQuery | null> {
    this.check();
    const found = this.rows.get(id);
    if (!found) return null;
    const updated = { ...found, ...patch, updatedAt: this.clock() };
    this.rows.set(id, updated);
    return { ...updated };
  }

  async delete(id: string): Promise<boolean> {
    this.check();
    return this.rows.delete(id);
  }

  async listByRequester(requester: Requester): Promise<IQuery[]> {
    this.check();
    const matches = (q: IQuery) =>
      "identity" in requester
        ? q.requesterIdentity === requester.identity
        : q.requesterIdentity === null && q.requesterEmail === requester.email.trim().toLowerCase();
    return [...this.rows.values()]
      .filter(matches)
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime() || b.id.localeCompare(a.id))
      .map((q) => ({ ...q }));
  }

  async markRepliesSeen(ids: string[]): Promise<void> {
    this.check();
    for (const id of ids) {
      const found = this.rows.get(id);
      if (found) this.rows.set(id, { ...found, adminReplySeen: true });
    }
  }

  async countByStatus(): Promise<StatusCounts> {
    this.check();
    const counts: StatusCounts = { pending: 0, "in-progress": 0, resolved: 0 };
    for (const q of this.rows.values()) counts[q.status] += 1;
    return counts;
  }

  async countCreatedSince(since: Date, granularity: TimeGranularity): Promise<CreatedBucket[]> {
    this.check();
    const buckets = new Map<number, number>();
    for (const q of this.rows.values()) {
      if (q.createdAt < since) continue;
      const start = startOfBucket(q.createdAt, granularity).getTime();
      buckets.set(start, (buckets.get(start) ?? 0) + 1);
    }
    return [...buckets.entries()].sort(([a], [b]) => a - b).map(([start, count]) => ({ start: new Date(start), count }));
  }

  async recent(limit: number): Promise<IQuery[]> {
    this.check();
    return [...this.rows.values()]
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime() || b.id.localeCompare(a.id))
      .slice(0, limit)
      .map((q) => ({ ...q }));
  }
}
