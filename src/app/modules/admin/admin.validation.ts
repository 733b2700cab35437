import { z } from "zod";
import { forgotPasswordValidation, passwordRule, resetPasswordValidation } from "../student/student.validation";

export { forgotPasswordValidation, resetPasswordValidation };

export const adminLoginValidation = z.object({
  identifier: z.string().trim().min(1, "Username or email is required"),
  password: z.string().min(1, "Password is required"),
});

export const registerAdminValidation = z.object({
  username: z
    .string()
    .trim()
    .min(3, "Username must be at least 3 characters")
    .max(50)
    .regex(/^[A-Za-z0-9_.-]+$/, "Username may only contain letters, digits, dot, dash and underscore"),
  email: z.string().trim().toLowerCase().email("Invalid email"),
  name: z.string().trim().min(1, "Name is required").max(150),
  password: passwordRule,
});
