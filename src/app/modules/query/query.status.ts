import status from "http-status";
import { ErrorCode, getApiErrorClass } from "@/interface";
import { IQuery, QUERY_STATUSES, QueryPatch, QueryStatus } from "./query.interface";

const ApiError = getApiErrorClass("STATUS_ENGINE");

export const ALLOWED_TRANSITIONS: Readonly<Record<QueryStatus, readonly QueryStatus[]>> = {
  pending: ["in-progress", "resolved"],
  "in-progress": ["resolved", "pending"],
  resolved: ["in-progress", "pending"],
};

export const isQueryStatus = (value: unknown): value is QueryStatus =>
  typeof value === "string" && QUERY_STATUSES.some((s) => s === value);

export const canTransition = (from: QueryStatus, to: QueryStatus) =>
  from === to || ALLOWED_TRANSITIONS[from].includes(to);

export interface QueryChange {
  status?: string;
  adminResponse?: string | null;
}

export interface PlannedChange {
  patch: QueryPatch;
  responseChanged: boolean;
}

/**
 * Works out the patch for an admin edit without touching the store.
 * Keeps `resolvedAt` non-null exactly while the status is `resolved`.
 */
export const planChange = (current: IQuery, change: QueryChange, now: Date): PlannedChange => {
  const patch: QueryPatch = {};

  if (change.status !== undefined) {
    const target = change.status;
    if (!isQueryStatus(target)) {
      throw new ApiError(
        status.UNPROCESSABLE_ENTITY,
        `Invalid status "${target}". Expected one of: ${QUERY_STATUSES.join(", ")}`,
        ErrorCode.INVALID_STATUS
      );
    }
    if (!canTransition(current.status, target)) {
      throw new ApiError(
        status.UNPROCESSABLE_ENTITY,
        `Cannot move a query from ${current.status} to ${target}`,
        ErrorCode.INVALID_STATUS
      );
    }
    if (target !== current.status) {
      patch.status = target;
      patch.resolvedAt = target === "resolved" ? now : null;
    }
  }

  let responseChanged = false;
  if (change.adminResponse !== undefined && change.adminResponse !== current.adminResponse) {
    patch.adminResponse = change.adminResponse;
    responseChanged = change.adminResponse !== null;
    if (responseChanged) {
      patch.adminReplyAt = now;
      patch.adminReplySeen = false;
    }
  }

  return { patch, responseChanged };
};
