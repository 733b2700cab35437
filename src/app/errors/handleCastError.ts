import { ApiError, ErrorCode } from "@/interface";
import status from "http-status";
import mongoose from "mongoose";

// a malformed id can never name an existing record
export const handleCastError = (err: mongoose.Error.CastError) => {
  if (err.path === "_id") {
    return new ApiError(status.NOT_FOUND, `No record found for id ${String(err.value)}`, "DB", ErrorCode.NOT_FOUND);
  }
  return new ApiError(status.BAD_REQUEST, `Invalid ${err.path}: ${String(err.value)}.`, "DB", ErrorCode.VALIDATION_ERROR);
};
