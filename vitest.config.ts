import path from "path";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: {
      "@": path.resolve(__dirname, "src/app"),
    },
  },
  test: {
    environment: "node",
    include: ["src/**/*.test.ts"],
    env: {
      NODE_ENV: "test",
      DATABASE_URL: "mongodb://127.0.0.1:27017/query-desk-test",
      REDIS_URL: "redis://127.0.0.1:6379",
      JWT_SECRET: "test-secret",
    },
  },
});
