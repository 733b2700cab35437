import { ZodError, type ZodType } from "zod";
import { handleZodError } from "@/errors";

/** zod parse that surfaces failures as a VALIDATION_ERROR ApiError tagged with `context`. */
export const parseWith = <T>(schema: ZodType<T>, input: unknown, context: string): T => {
  try {
    return schema.parse(input);
  } catch (err) {
    if (err instanceof ZodError) throw handleZodError(err, context);
    throw err;
  }
};
