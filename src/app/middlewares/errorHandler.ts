import { Request, Response, NextFunction } from 'express';
import mongoose from 'mongoose';
import status from 'http-status';
import { ZodError } from 'zod';
import {
  handleCastError,
  handleDuplicateError,
  handleStoreError,
  handleValidationError,
  handleZodError,
  isDuplicateKeyError,
  isStoreUnavailableError,
} from '@/errors';
import { ApiError, ErrorCode } from '@/interface';
import { logger } from '@/config/logger';
import config from '@/config';

export const toApiError = (err: unknown): ApiError => {
  if (err instanceof ApiError) return err;
  if (err instanceof ZodError) return handleZodError(err);
  if (err instanceof mongoose.Error.CastError) return handleCastError(err);
  if (err instanceof mongoose.Error.ValidationError) return handleValidationError(err);
  if (isDuplicateKeyError(err)) return handleDuplicateError(err);
  if (isStoreUnavailableError(err)) return handleStoreError(err);
  const message = err instanceof Error ? err.message : 'Internal Server Error';
  return new ApiError(status.INTERNAL_SERVER_ERROR, message, 'Global', ErrorCode.INTERNAL_ERROR);
};

export const errorHandler = (err: unknown, req: Request, res: Response, _next: NextFunction) => {
  const apiError = toApiError(err);
  if (apiError.statusCode >= 500) {
    logger.error(`[${apiError.context}] ${req.method} ${req.originalUrl} failed: ${apiError.message}`);
  } else {
    logger.warn(`[${apiError.context}] ${req.method} ${req.originalUrl}: ${apiError.message}`);
  }

  const stack = err instanceof Error ? err.stack : undefined;
  res.status(apiError.statusCode).json({
    success: false,
    statusCode: apiError.statusCode,
    code: apiError.code,
    message: apiError.message,
    stack: config.NODE_ENV === 'development' ? stack : undefined,
  });
};
