import config from "@/config";
import type { SessionRole } from "./generateToken";

export const passwordResetLink = (role: SessionRole, token: string) =>
  `${config.APP_URL.replace(/\/+$/, "")}/${role}/reset-password?token=${encodeURIComponent(token)}`;

export const formatPasswordResetEmail = (role: SessionRole, name: string, token: string) => ({
  subject: `${config.MAIL_FROM_NAME} ${role === "admin" ? "Admin" : "Student"} Password Reset`,
  text: [
    `Hello ${name},`,
    "",
    "Use the link below to choose a new password. It expires in one hour.",
    "",
    passwordResetLink(role, token),
    "",
    "If you did not ask for this, you can ignore this email.",
  ].join("\n"),
});
