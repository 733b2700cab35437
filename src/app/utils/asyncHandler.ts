import { NextFunction, Request, Response, RequestHandler } from "express";
import type { SessionUser } from "./generateToken";

declare global {
    namespace Express {
        interface Request {
            user?: SessionUser;
        }
    }
}

export const asyncHandler = (fn: RequestHandler) => (req: Request, res: Response, next: NextFunction) => Promise.resolve(fn(req, res, next)).catch((err) => next(err));
