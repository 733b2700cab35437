import { isValidObjectId, Types, type FilterQuery, type PipelineStage } from "mongoose";
import { guardStore } from "@/errors";
import { escapeRegex } from "@/utils/escapeRegex";
import {
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
} from "./query.interface";
import { LeanQuery, Query, QueryAttrs, toQuery } from "./query.model";
import { isQueryStatus } from "./query.status";

const CONTEXT = "QUERY_STORE";

const buildFilter = (filter: QueryFilter): FilterQuery<QueryAttrs> => {
  const mongoFilter: FilterQuery<QueryAttrs> = {};
  if (filter.status) mongoFilter.status = filter.status;
  if (filter.category) mongoFilter.category = filter.category;
  if (filter.requesterType === "student") mongoFilter.requesterIdentity = { $ne: null };
  if (filter.requesterType === "guest") mongoFilter.requesterIdentity = null;
  if (filter.searchText) {
    const regex = new RegExp(escapeRegex(filter.searchText), "i");
    mongoFilter.$or = [
      { message: { $regex: regex } },
      { requesterName: { $regex: regex } },
      { requesterEmail: { $regex: regex } },
    ];
  }
  return mongoFilter;
};

const truncateStage = (granularity: TimeGranularity) =>
  granularity === "week"
    ? { $dateTrunc: { date: "$createdAt", unit: "week", startOfWeek: "monday", timezone: "UTC" } }
    : { $dateTrunc: { date: "$createdAt", unit: granularity, timezone: "UTC" } };

export const mongoQueryStore: QueryStore = {
  async create(input: NewQuery): Promise<IQuery> {
    return guardStore(CONTEXT, async () => {
      const doc = await Query.create({
        ...input,
        requesterIdentity: input.requesterIdentity ? new Types.ObjectId(input.requesterIdentity) : null,
        status: "pending",
        adminResponse: null,
        adminReplyAt: null,
        adminReplySeen: false,
        resolvedAt: null,
      });
      return toQuery(doc.toObject<LeanQuery>({ transform: false }));
    });
  },

  async findById(id: string): Promise<IQuery | null> {
    if (!isValidObjectId(id)) return null;
    return guardStore(CONTEXT, async () => {
      const doc = await Query.findById(id).lean<LeanQuery>();
      return doc ? toQuery(doc) : null;
    });
  },

  async list(filter: QueryFilter, pagination: Pagination, ordering: QueryOrdering) {
    return guardStore(CONTEXT, async () => {
      const mongoFilter = buildFilter(filter);
      const direction = ordering.order === "asc" ? 1 : -1;
      const skip = (pagination.page - 1) * pagination.limit;
      const [docs, total] = await Promise.all([
        Query.find(mongoFilter)
          .sort({ [ordering.sortBy]: direction, _id: direction })
          .skip(skip)
          .limit(pagination.limit)
          .lean<LeanQuery[]>(),
        Query.countDocuments(mongoFilter),
      ]);
      return { items: docs.map(toQuery), total };
    });
  },

  async update(id: string, patch: QueryPatch): Promise<IQuery | null> {
    if (!isValidObjectId(id)) return null;
    return guardStore(CONTEXT, async () => {
      const doc = await Query.findByIdAndUpdate(id, { $set: patch }, { new: true, runValidators: true }).lean<LeanQuery>();
      return doc ? toQuery(doc) : null;
    });
  },

  async delete(id: string): Promise<boolean> {
    if (!isValidObjectId(id)) return false;
    return guardStore(CONTEXT, async () => {
      const result = await Query.deleteOne({ _id: id });
      return result.deletedCount > 0;
    });
  },

  async listByRequester(requester: Requester): Promise<IQuery[]> {
    let filter: FilterQuery<QueryAttrs>;
    if ("identity" in requester) {
      if (!isValidObjectId(requester.identity)) return [];
      filter = { requesterIdentity: new Types.ObjectId(requester.identity) };
    } else {
      filter = { requesterEmail: requester.email.trim().toLowerCase(), requesterIdentity: null };
    }
    return guardStore(CONTEXT, async () => {
      const docs = await Query.find(filter).sort({ createdAt: -1, _id: -1 }).lean<LeanQuery[]>();
      return docs.map(toQuery);
    });
  },

  async markRepliesSeen(ids: string[]): Promise<void> {
    const objectIds = ids.filter((id) => isValidObjectId(id)).map((id) => new Types.ObjectId(id));
    if (objectIds.length === 0) return;
    await guardStore(CONTEXT, async () => {
      await Query.updateMany({ _id: { $in: objectIds } }, { $set: { adminReplySeen: true } }, { timestamps: false });
    });
  },

  async countByStatus(): Promise<StatusCounts> {
    return guardStore(CONTEXT, async () => {
      const rows = await Query.aggregate<{ _id: string; count: number }>([
        { $group: { _id: "$status", count: { $sum: 1 } } },
      ]);
      const counts: StatusCounts = { pending: 0, "in-progress": 0, resolved: 0 };
      for (const row of rows) {
        if (isQueryStatus(row._id)) counts[row._id] = row.count;
      }
      return counts;
    });
  },

  async countCreatedSince(since: Date, granularity: TimeGranularity): Promise<CreatedBucket[]> {
    const pipeline: PipelineStage[] = [
      { $match: { createdAt: { $gte: since } } },
      { $group: { _id: truncateStage(granularity), count: { $sum: 1 } } },
      { $sort: { _id: 1 } },
    ];
    return guardStore(CONTEXT, async () => {
      const rows = await Query.aggregate<{ _id: Date; count: number }>(pipeline);
      return rows.map((row) => ({ start: new Date(row._id), count: row.count }));
    });
  },

  async recent(limit: number): Promise<IQuery[]> {
    return guardStore(CONTEXT, async () => {
      const docs = await Query.find().sort({ createdAt: -1, _id: -1 }).limit(limit).lean<LeanQuery[]>();
      return docs.map(toQuery);
    });
  },
};
