import { z } from "zod";

export const toggleBlockedEmailValidation = z.object({
  email: z.string().trim().toLowerCase().email("Invalid email"),
});
