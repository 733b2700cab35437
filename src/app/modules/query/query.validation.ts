import { z } from "zod";
import { QUERY_STATUSES } from "./query.interface";

const optionalText = (max: number) =>
  z
    .string()
    .trim()
    .max(max)
    .optional()
    .nullable()
    .transform((value) => (value ? value : null));

export const createQueryValidation = z.object({
  requesterName: z.string().trim().min(1, "Name is required").max(200),
  requesterEmail: z.string().trim().toLowerCase().email("Invalid email").max(200),
  category: optionalText(100),
  message: z.string().trim().min(1, "Message is required").max(5000),
});

export type CreateQueryInput = z.input<typeof createQueryValidation>;

// status stays a free string here: unknown targets are the status engine's to reject
export const updateQueryValidation = z
  .object({
    status: z.string().trim().min(1).optional(),
    adminResponse: z
      .string()
      .trim()
      .min(1, "Response cannot be empty")
      .max(5000)
      .nullable()
      .optional(),
  })
  .refine((body) => body.status !== undefined || body.adminResponse !== undefined, {
    message: "Provide a status, an adminResponse, or both",
  });

export type UpdateQueryInput = z.input<typeof updateQueryValidation>;

export const listQueriesValidation = z.object({
  page: z.coerce.number().int().min(1).default(1),
  limit: z.coerce.number().int().min(1).max(100).default(20),
  status: z.enum(QUERY_STATUSES).optional(),
  category: z.string().trim().min(1).optional(),
  search: z.string().trim().min(1).optional(),
  requesterType: z.enum(["student", "guest"]).optional(),
  sortBy: z.enum(["createdAt", "updatedAt", "resolvedAt"]).default("createdAt"),
  order: z.enum(["asc", "desc"]).default("desc"),
});

export type ListQueriesInput = z.input<typeof listQueriesValidation>;

export const trackQueriesValidation = z.object({
  email: z.string().trim().toLowerCase().email("Invalid email"),
});
