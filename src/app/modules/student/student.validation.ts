import { z } from "zod";

const passwordRule = z
  .string()
  .min(8, "Password must be at least 8 characters")
  .max(128)
  .regex(/[A-Za-z]/, "Password must contain a letter")
  .regex(/\d/, "Password must contain a digit")
  .regex(/[@$!%*?&]/, "Password must contain one of @$!%*?&");

export const signupValidation = z.object({
  studentId: z.string().trim().min(1, "Student ID is required").max(50),
  name: z.string().trim().min(1, "Name is required").max(150),
  email: z.string().trim().toLowerCase().email("Invalid email"),
  password: passwordRule,
});

export const loginValidation = z.object({
  identifier: z.string().trim().min(1, "Student ID or email is required"),
  password: z.string().min(1, "Password is required"),
});

export const forgotPasswordValidation = z.object({
  identifier: z.string().trim().min(1, "Username, student ID or email is required"),
});

export const resetPasswordValidation = z
  .object({
    token: z.string().trim().min(1, "Reset token is required"),
    password: passwordRule,
    confirmPassword: z.string(),
  })
  .refine((body) => body.password === body.confirmPassword, {
    message: "Passwords do not match",
    path: ["confirmPassword"],
  });

export { passwordRule };
