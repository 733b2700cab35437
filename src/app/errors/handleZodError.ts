import { ApiError, ErrorCode } from "@/interface";
import status from "http-status";
import { ZodError } from "zod";

export const handleZodError = (err: ZodError, context = "VALIDATION") => {
  const errors = err.issues.map((issue) => `${issue.path.length ? issue.path.join('/') : 'body'} ::${issue.message}`).join(' || ');
  return new ApiError(status.BAD_REQUEST, errors, context, ErrorCode.VALIDATION_ERROR);
};
