import { z } from "zod";

export const timeseriesValidation = z.object({
  granularity: z.enum(["day", "week", "month"]).default("day"),
  buckets: z.coerce.number().int().min(30).max(365).default(30),
});
