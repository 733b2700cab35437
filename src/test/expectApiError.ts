import { expect } from "vitest";
import { ApiError, ErrorCode } from "@/interface";

/** Awaits `pending` and asserts it rejected with an ApiError of the given status and code. */
export const expectApiError = async (pending: Promise<unknown>, statusCode: number, code: ErrorCode): Promise<ApiError> => {
  let caught: unknown = null;
  try {
    await pending;
  } catch (err) {
    caught = err;
  }
  expect(caught).toBeInstanceOf(ApiError);
  if (!(caught instanceof ApiError)) throw new Error("expected an ApiError rejection");
  expect(caught.statusCode).toBe(statusCode);
  expect(caught.code).toBe(code);
  return caught;
};
