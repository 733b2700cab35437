import status from "http-status";
import { logger } from "@/config/logger";
import { ErrorCode, getApiErrorClass } from "@/interface";
import { parseWith } from "@/utils/parseWith";
import { comparePassword, hashPassword } from "@/utils/password";
import { generateResetToken, generateToken, verifyResetToken } from "@/utils/generateToken";
import { formatPasswordResetEmail } from "@/utils/passwordReset";
import { sendEmail, type Mailer } from "@/utils/sendEmail";
import type { AdminStore, IAdmin } from "./admin.interface";
import { adminLoginValidation, forgotPasswordValidation, registerAdminValidation, resetPasswordValidation } from "./admin.validation";

const CONTEXT = "ADMIN";
const ApiError = getApiErrorClass(CONTEXT);

export interface DefaultAdmin {
  username: string;
  email: string;
  name: string;
  password?: string;
}

export interface AdminServiceDeps {
  admins: AdminStore;
  mailer?: Mailer;
}

export const createAdminService = ({ admins, mailer = sendEmail }: AdminServiceDeps) => ({
  async login(body: unknown): Promise<{ admin: IAdmin; token: string }> {
    const { identifier, password } = parseWith(adminLoginValidation, body, CONTEXT);
    const found = await admins.findForLogin(identifier);
    if (!found || !(await comparePassword(password, found.passwordHash))) {
      throw new ApiError(status.FORBIDDEN, "Invalid credentials", ErrorCode.FORBIDDEN);
    }
    if (!found.isActive) {
      throw new ApiError(status.FORBIDDEN, "Account is disabled", ErrorCode.FORBIDDEN);
    }
    const { passwordHash: _, ...admin } = found;
    return { admin, token: generateToken({ id: admin.id, role: "admin", name: admin.name }) };
  },

  async me(id: string): Promise<IAdmin> {
    const admin = await admins.findById(id);
    if (!admin) throw new ApiError(status.NOT_FOUND, `Admin ${id} not found`, ErrorCode.NOT_FOUND);
    return admin;
  },

  async register(body: unknown): Promise<IAdmin> {
    const { username, email, name, password } = parseWith(registerAdminValidation, body, CONTEXT);
    if (await admins.existsByUsernameOrEmail(username, email)) {
      throw new ApiError(status.CONFLICT, "Username or email already taken", ErrorCode.CONFLICT);
    }
    return admins.create({ username, email, name, passwordHash: await hashPassword(password) });
  },

  /**
   * Mails a one-hour reset link to the admin found by username or e-mail.
   * Unknown accounts get the same silent success.
   */
  async forgotPassword(body: unknown): Promise<void> {
    const { identifier } = parseWith(forgotPasswordValidation, body, CONTEXT);
    const admin = await admins.findForLogin(identifier);
    if (!admin) {
      logger.info(`[${CONTEXT}] Password reset requested for an unknown account`);
      return;
    }
    const { subject, text } = formatPasswordResetEmail("admin", admin.name, generateResetToken({ id: admin.id, role: "admin" }));
    try {
      await mailer(admin.email, subject, text);
    } catch (err) {
      logger.error(`[${CONTEXT}] Password reset email failed for ${admin.email}: ${err instanceof Error ? err.message : String(err)}`);
    }
  },

  async resetPassword(body: unknown): Promise<void> {
    const { token, password } = parseWith(resetPasswordValidation, body, CONTEXT);
    const id = verifyResetToken(token, "admin");
    if (!id || !(await admins.updatePasswordHash(id, await hashPassword(password)))) {
      throw new ApiError(status.FORBIDDEN, "Reset link is invalid or expired", ErrorCode.FORBIDDEN);
    }
    logger.info(`[${CONTEXT}] Password reset for admin ${id}`);
  },

  async isActive(id: string): Promise<boolean> {
    const admin = await admins.findById(id);
    return admin !== null && admin.isActive;
  },

  /**
   * Creates the default admin unless one with that username exists.
   * Returns the created admin, or null when nothing was done.
   */
  async bootstrapDefaultAdmin({ username, email, name, password }: DefaultAdmin): Promise<IAdmin | null> {
    if (!password) {
      logger.warn(`[${CONTEXT}] DEFAULT_ADMIN_PASSWORD not set, skipping default admin bootstrap`);
      return null;
    }
    if (await admins.findByUsername(username)) {
      logger.info(`[${CONTEXT}] Default admin "${username}" already exists`);
      return null;
    }
    const admin = await admins.create({ username, email, name, passwordHash: await hashPassword(password) });
    logger.info(`[${CONTEXT}] Created default admin "${username}"`);
    return admin;
  },
});

export type AdminService = ReturnType<typeof createAdminService>;
