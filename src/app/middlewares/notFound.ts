import { ApiError, ErrorCode } from '@/interface';
import { Request, Response, NextFunction } from 'express';
import status from 'http-status';

export const notFound = (req: Request, res: Response, next: NextFunction) => {
  next(new ApiError(status.NOT_FOUND, `Route Not Found: ${req.method} ${req.originalUrl}`, 'Global', ErrorCode.NOT_FOUND));
};
