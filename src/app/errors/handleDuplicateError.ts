import { ApiError, ErrorCode } from "@/interface";
import status from "http-status";

export const handleDuplicateError = (err: { message: string; keyValue?: Record<string, unknown> }) => {
  const field = err.keyValue ? Object.keys(err.keyValue)[0] : undefined;
  const match = err.message.match(/"([^"]*)"/);

  const extractedMessage = field ?? (match && match[1]) ?? "Value";

  const message = `${extractedMessage} already exists`;

  return new ApiError(status.CONFLICT, message, "DB", ErrorCode.CONFLICT);
};

export const isDuplicateKeyError = (err: unknown): err is { code: number; message: string; keyValue?: Record<string, unknown> } =>
  typeof err === "object" &&
  err !== null &&
  "code" in err &&
  err.code === 11000 &&
  "message" in err &&
  typeof err.message === "string";
