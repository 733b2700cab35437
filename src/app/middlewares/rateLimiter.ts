import rateLimit, {
  Options,
  RateLimitRequestHandler,
  ipKeyGenerator,
} from "express-rate-limit";
import { ApiError, ErrorCode } from "@/interface";
import status from "http-status";
import { Request } from "express";

type RateLimiterOptions = {
  windowMs: number;
  max: number;
  message: string;
  keyGenerator?: Options["keyGenerator"];
};

const createRateLimiter = (options: RateLimiterOptions): RateLimitRequestHandler => {
  return rateLimit({
    ...options,
    standardHeaders: true,
    legacyHeaders: false,
    handler: (req, res, next) => {
      next(new ApiError(status.TOO_MANY_REQUESTS, options.message, "RATE_LIMIT", ErrorCode.TOO_MANY_REQUESTS));
    },
  });
};

// General API rate limiter: 100 requests per minute
export const apiLimiter = createRateLimiter({
  windowMs: 60 * 1000,
  max: 100,
  message: "Too many requests from this IP, please try again later.",
});

// Login attempts: 5 per 15 minutes
export const authLimiter = createRateLimiter({
  windowMs: 15 * 60 * 1000,
  max: 5,
  message:
    "Too many authentication attempts from this IP. Please try again later.",
});

// Public submissions: 20 per hour
export const submissionLimiter = createRateLimiter({
  windowMs: 60 * 60 * 1000,
  max: 20,
  message: "Too many queries submitted from this IP. Please try again later.",
});

// Authenticated actions: 200 per minute per session
export const authenticatedActionLimiter = createRateLimiter({
  windowMs: 60 * 1000,
  max: 200,
  message: "You are performing this action too frequently. Please try again later.",
  keyGenerator: (req: Request): string => {
    if (req.user?.id) {
      return `${req.user.role}:${req.user.id}`;
    }
    return ipKeyGenerator(req.ip ?? "unknown");
  },
});
