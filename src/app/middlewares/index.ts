import { createAuth } from "./authMiddleware";
import { sessionLookup } from "@/container";

export { createAuth } from "./authMiddleware";
export type { SessionLookup } from "./authMiddleware";
export * from "./errorHandler";
export * from "./notFound";
export * from "./rateLimiter";

export const { auth, optionalAuth } = createAuth(sessionLookup);
