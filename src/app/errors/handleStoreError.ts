import { ApiError, ErrorCode } from "@/interface";
import status from "http-status";

const UNAVAILABLE_ERROR_NAMES = new Set([
  "MongoNetworkError",
  "MongoNetworkTimeoutError",
  "MongoServerSelectionError",
  "MongooseServerSelectionError",
  "MongoNotConnectedError",
  "MongoTopologyClosedError",
]);

const hasName = (err: unknown): err is { name: string; message: string } =>
  typeof err === "object" &&
  err !== null &&
  "name" in err &&
  typeof err.name === "string" &&
  "message" in err &&
  typeof err.message === "string";

export const isStoreUnavailableError = (err: unknown): boolean => {
  if (!hasName(err)) return false;
  if (UNAVAILABLE_ERROR_NAMES.has(err.name)) return true;
  // mongoose buffering timeout: "Operation `queries.find()` buffering timed out after 5000ms"
  return err.name === "MongooseError" && /buffering timed out/.test(err.message);
};

export const handleStoreError = (err: unknown, context = "DB") => {
  const detail = hasName(err) ? err.message : String(err);
  return new ApiError(status.SERVICE_UNAVAILABLE, `Store unavailable: ${detail}`, context, ErrorCode.STORE_UNAVAILABLE);
};

/** Runs a store operation, turning connectivity failures into STORE_UNAVAILABLE. */
export const guardStore = async <T>(context: string, op: () => Promise<T>): Promise<T> => {
  try {
    return await op();
  } catch (err) {
    if (isStoreUnavailableError(err)) throw handleStoreError(err, context);
    throw err;
  }
};
