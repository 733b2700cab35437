import type { CookieOptions, Request } from "express";
import config from "@/config";
import type { SessionRole } from "./generateToken";

export const sessionMaxAge = () => config.JWT_EXPIRES_IN * 1000;

export const getCookieName = (role: SessionRole) =>
  role === "admin" ? "admin_accessToken" : "student_accessToken";

export const sessionCookieOptions = (): CookieOptions => {
  const isProd = config.NODE_ENV === "production";
  return {
    httpOnly: true,
    secure: isProd,
    sameSite: isProd ? "none" : "lax",
    path: "/",
  };
};

export type TokenSource = Pick<Request, "cookies" | "headers">;

/**
 * Session token for the given role: the role's cookie first, then a bearer
 * Authorization header.
 */
export const getTokenFromRequest = (req: TokenSource, role: SessionRole): string | undefined => {
  const cookies: Record<string, unknown> = req.cookies ?? {};
  const fromCookie = cookies[getCookieName(role)];
  if (typeof fromCookie === "string" && fromCookie) return fromCookie;
  const header = req.headers.authorization;
  if (header?.startsWith("Bearer ")) {
    const token = header.slice("Bearer ".length).trim();
    return token || undefined;
  }
  return undefined;
};
