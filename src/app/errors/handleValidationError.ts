import { ApiError, ErrorCode } from "@/interface";
import status from "http-status";
import mongoose from "mongoose";

export const handleValidationError = (err: mongoose.Error.ValidationError) => {
  const errors = Object.values(err.errors).map((el) => el.message);
  const message = `Invalid input data. ${errors.join('. ')}`;
  return new ApiError(status.BAD_REQUEST, message, "DB", ErrorCode.VALIDATION_ERROR);
};
