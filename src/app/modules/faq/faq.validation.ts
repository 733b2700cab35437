import { z } from "zod";

const nullableText = (max: number) =>
  z
    .string()
    .trim()
    .max(max)
    .nullable()
    .transform((value) => (value ? value : null));

export const listFaqsValidation = z.object({
  category: z.string().trim().min(1).optional(),
});

export const createFaqValidation = z.object({
  question: z.string().trim().min(1, "Question is required").max(1000),
  answer: nullableText(5000).optional(),
  category: nullableText(100).optional(),
});

export type CreateFaqInput = z.input<typeof createFaqValidation>;

export const setAnswerValidation = z.object({
  answer: nullableText(5000),
  category: nullableText(100).optional(),
});

export type SetAnswerInput = z.input<typeof setAnswerValidation>;
