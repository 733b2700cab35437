import { Response, NextFunction, Request, RequestHandler } from "express";
import status from "http-status";
import { ApiError, ErrorCode } from "@/interface";
import { getTokenFromRequest, type TokenSource } from "@/utils/cookieUtils";
import { verifyToken, type SessionRole, type SessionUser } from "@/utils/generateToken";

/**
 * Confirms that the account behind a verified token may still act:
 * admins must be active, students must not be blocked.
 */
export interface SessionLookup {
  isActive(user: SessionUser): Promise<boolean>;
}

const forbidden = (message: string) =>
  new ApiError(status.FORBIDDEN, message, "AUTH_MIDDLEWARE", ErrorCode.FORBIDDEN);

export const createAuth = (lookup: SessionLookup, secret?: string) => {
  /** Session gate: resolves the caller's session or rejects with a 403. */
  const authenticate = async (req: TokenSource, role: SessionRole): Promise<SessionUser> => {
    const token = getTokenFromRequest(req, role);
    if (!token) {
      throw forbidden("Authentication required. No session provided");
    }
    const session = verifyToken(token, secret);
    if (!session) {
      throw forbidden("Invalid or expired session");
    }
    if (session.role !== role) {
      throw forbidden("You do not have permission to perform this action");
    }
    if (!(await lookup.isActive(session))) {
      throw forbidden("Account is disabled");
    }
    return session;
  };

  const auth = (role: SessionRole): RequestHandler => {
    return async (req: Request, res: Response, next: NextFunction) => {
      try {
        req.user = await authenticate(req, role);
        next();
      } catch (error) {
        next(error);
      }
    }
  };

  /**
   * Like `authenticate`, but a request that carries no token at all is
   * anonymous (null). A token that is present still has to pass every check.
   */
  const authenticateIfPresent = async (req: TokenSource, role: SessionRole): Promise<SessionUser | null> => {
    if (!getTokenFromRequest(req, role)) return null;
    return authenticate(req, role);
  };

  const optionalAuth = (role: SessionRole): RequestHandler => {
    return async (req: Request, res: Response, next: NextFunction) => {
      try {
        const session = await authenticateIfPresent(req, role);
        if (session) req.user = session;
        next();
      } catch (error) {
        next(error);
      }
    }
  };

  return { authenticate, authenticateIfPresent, auth, optionalAuth };
};
