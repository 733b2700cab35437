import status from "http-status";
import { ErrorCode, getApiErrorClass } from "@/interface";
import { parseWith } from "@/utils/parseWith";
import { logger } from "@/config/logger";
import type { CacheClient } from "@/config/redis";
import { invalidateDashboardCaches } from "@/utils/invalidateCache";
import type { FaqService } from "../faq/faq.service";
import type { StudentStore } from "../student/student.interface";
import type { BlockedEmailStore } from "../blocked-email/blocked-email.interface";
import type { IQuery, QueryNotifier, QueryPage, QueryStore, Requester } from "./query.interface";
import { planChange } from "./query.status";
import { createQueryValidation, listQueriesValidation, updateQueryValidation } from "./query.validation";

const CONTEXT = "QUERY";
const ApiError = getApiErrorClass(CONTEXT);

const describe = (err: unknown) => (err instanceof Error ? err.message : String(err));

export interface QueryServiceDeps {
  queries: QueryStore;
  faq: Pick<FaqService, "recordSubmission">;
  students: Pick<StudentStore, "findById">;
  blockedEmails: Pick<BlockedEmailStore, "isBlocked">;
  cache: CacheClient;
  notifier?: QueryNotifier;
  clock?: () => Date;
}

export interface UpdateResult {
  query: IQuery;
  /** True when this call wrote a new admin response. */
  responseChanged: boolean;
}

export const createQueryService = ({
  queries,
  faq,
  students,
  blockedEmails,
  cache,
  notifier,
  clock = () => new Date(),
}: QueryServiceDeps) => {
  const notFound = (id: string) => new ApiError(status.NOT_FOUND, `Query ${id} not found`, ErrorCode.NOT_FOUND);

  const assertCanSubmit = async (requesterIdentity: string | null, email: string) => {
    if (requesterIdentity) {
      const student = await students.findById(requesterIdentity);
      if (!student) {
        throw new ApiError(status.FORBIDDEN, "Student account not found", ErrorCode.FORBIDDEN);
      }
      if (student.isBlocked) {
        throw new ApiError(status.FORBIDDEN, "Your account has been blocked", ErrorCode.FORBIDDEN);
      }
      return;
    }
    if (await blockedEmails.isBlocked(email)) {
      throw new ApiError(status.FORBIDDEN, "This email is blocked from submitting queries", ErrorCode.FORBIDDEN);
    }
  };

  return {
    /**
     * Stores a submission as a pending query, then offers its message to the
     * FAQ aggregator. Aggregation failures are logged and never undo the
     * stored query.
     */
    async create(body: unknown, requesterIdentity: string | null = null): Promise<IQuery> {
      const input = parseWith(createQueryValidation, body, CONTEXT);
      await assertCanSubmit(requesterIdentity, input.requesterEmail);

      const query = await queries.create({ ...input, requesterIdentity });

      try {
        await faq.recordSubmission(query.message, query.category);
      } catch (err) {
        logger.error(`[${CONTEXT}] FAQ aggregation failed for query ${query.id}: ${describe(err)}`);
      }
      await invalidateDashboardCaches(cache);
      return query;
    },

    async get(id: string): Promise<IQuery> {
      const query = await queries.findById(id);
      if (!query) throw notFound(id);
      return query;
    },

    async list(params: unknown = {}): Promise<QueryPage> {
      const { page, limit, status: qStatus, category, search, requesterType, sortBy, order } = parseWith(listQueriesValidation, params, CONTEXT);
      const { items, total } = await queries.list(
        { status: qStatus, category, searchText: search, requesterType },
        { page, limit },
        { sortBy, order }
      );
      return { items, total, page, limit, totalPages: Math.ceil(total / limit) };
    },

    async update(id: string, body: unknown): Promise<UpdateResult> {
      const change = parseWith(updateQueryValidation, body, CONTEXT);
      const current = await queries.findById(id);
      if (!current) throw notFound(id);

      const { patch, responseChanged } = planChange(current, change, clock());
      if (Object.keys(patch).length === 0) {
        return { query: current, responseChanged: false };
      }

      const updated = await queries.update(id, patch);
      if (!updated) throw notFound(id);

      if (responseChanged && notifier) {
        try {
          await notifier.responseChanged({ query: updated, previousResponse: current.adminResponse });
        } catch (err) {
          logger.error(`[${CONTEXT}] Response notification failed for query ${id}: ${describe(err)}`);
        }
      }
      await invalidateDashboardCaches(cache);
      return { query: updated, responseChanged };
    },

    async delete(id: string): Promise<void> {
      const deleted = await queries.delete(id);
      if (!deleted) throw notFound(id);
      await invalidateDashboardCaches(cache);
    },

    /**
     * A requester's own queries, newest first. Reading as a student marks
     * their unseen admin replies as seen; the returned records keep the
     * pre-read flag.
     */
    async listByRequester(requester: Requester): Promise<IQuery[]> {
      const items = await queries.listByRequester(requester);
      if ("identity" in requester) {
        const unseen = items.filter((q) => q.adminResponse !== null && !q.adminReplySeen).map((q) => q.id);
        if (unseen.length > 0) {
          try {
            await queries.markRepliesSeen(unseen);
          } catch (err) {
            logger.warn(`[${CONTEXT}] Could not mark replies seen for student ${requester.identity}: ${describe(err)}`);
          }
        }
      }
      return items;
    },
  };
};

export type QueryService = ReturnType<typeof createQueryService>;
