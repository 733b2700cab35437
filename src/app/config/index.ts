import dotenv from "dotenv";
import path from "path";
import { z } from "zod";
dotenv.config({
  path: path.join(process.cwd(), ".env"),
  quiet: true,
});

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() ? value.trim() : undefined));

const envSchema = z.object({
  PORT: z.coerce.number().default(3000),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),
  LOG_LEVEL: z
    .enum(["error", "warn", "info", "http", "verbose", "debug"])
    .default("info"),
  DATABASE_URL: z.string({
    error: "DATABASE_URL is required",
  }),
  REDIS_URL: z.string({
    error: "REDIS_URL is required",
  }),
  JWT_SECRET: z.string({
    error: "JWT_SECRET is required",
  }),
  JWT_EXPIRES_IN: z.coerce.number().int().positive().default(60 * 60 * 24 * 2),
  CORS_ORIGINS: optionalString,
  RESEND_API_KEY: optionalString,
  RESEND_DOMAIN: optionalString,
  MAIL_FROM_NAME: z.string().default("Query Desk"),
  // base of the links put in password reset mails
  APP_URL: z.string().default("http://localhost:3000"),
  DEFAULT_ADMIN_USERNAME: z.string().default("admin"),
  DEFAULT_ADMIN_EMAIL: z.string().default("admin@example.com"),
  DEFAULT_ADMIN_PASSWORD: optionalString,
});

export type Env = z.infer<typeof envSchema>;

let envVars: Env;
try {
  envVars = envSchema.parse(process.env);
  if (envVars.NODE_ENV !== "test") {
    console.info("[ENV] Environment variables loaded.");
  }
} catch (error) {
  if (error instanceof z.ZodError) {
    console.error(
      "[ENV] Environment variable validation error:",
      error.issues.map((issue) => issue.message).join(", ")
    );
  } else {
    console.error(
      "[ENV] Unexpected error during environment variable validation:",
      error
    );
  }
  process.exit(1);
}

export default envVars;
