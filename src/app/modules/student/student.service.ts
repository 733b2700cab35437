import status from "http-status";
import { ErrorCode, getApiErrorClass } from "@/interface";
import { parseWith } from "@/utils/parseWith";
import { comparePassword, hashPassword } from "@/utils/password";
import { logger } from "@/config/logger";
import { generateResetToken, generateToken, verifyResetToken } from "@/utils/generateToken";
import { formatPasswordResetEmail } from "@/utils/passwordReset";
import { sendEmail, type Mailer } from "@/utils/sendEmail";
import type { IStudent, StudentStore } from "./student.interface";
import { forgotPasswordValidation, loginValidation, resetPasswordValidation, signupValidation } from "./student.validation";

const CONTEXT = "STUDENT";
const ApiError = getApiErrorClass(CONTEXT);

export interface StudentServiceDeps {
  students: StudentStore;
  mailer?: Mailer;
}

export const createStudentService = ({ students, mailer = sendEmail }: StudentServiceDeps) => ({
  async signup(body: unknown): Promise<IStudent> {
    const { studentId, name, email, password } = parseWith(signupValidation, body, CONTEXT);
    if (await students.existsByEmailOrStudentId(email, studentId)) {
      throw new ApiError(status.CONFLICT, "Student ID or email already registered", ErrorCode.CONFLICT);
    }
    return students.create({ studentId, name, email, passwordHash: await hashPassword(password) });
  },

  async login(body: unknown): Promise<{ student: IStudent; token: string }> {
    const { identifier, password } = parseWith(loginValidation, body, CONTEXT);
    const found = await students.findForLogin(identifier);
    // same answer for unknown account and wrong password
    if (!found || !(await comparePassword(password, found.passwordHash))) {
      throw new ApiError(status.FORBIDDEN, "Invalid credentials", ErrorCode.FORBIDDEN);
    }
    if (found.isBlocked) {
      throw new ApiError(status.FORBIDDEN, "Your account has been blocked", ErrorCode.FORBIDDEN);
    }
    const { passwordHash: _, ...student } = found;
    return { student, token: generateToken({ id: student.id, role: "student", name: student.name }) };
  },

  /** Mails a one-hour reset link; unknown students get the same silent success. */
  async forgotPassword(body: unknown): Promise<void> {
    const { identifier } = parseWith(forgotPasswordValidation, body, CONTEXT);
    const student = await students.findForLogin(identifier);
    if (!student) {
      logger.info(`[${CONTEXT}] Password reset requested for an unknown account`);
      return;
    }
    const { subject, text } = formatPasswordResetEmail("student", student.name, generateResetToken({ id: student.id, role: "student" }));
    try {
      await mailer(student.email, subject, text);
    } catch (err) {
      logger.error(`[${CONTEXT}] Password reset email failed for ${student.email}: ${err instanceof Error ? err.message : String(err)}`);
    }
  },

  async resetPassword(body: unknown): Promise<void> {
    const { token, password } = parseWith(resetPasswordValidation, body, CONTEXT);
    const id = verifyResetToken(token, "student");
    if (!id || !(await students.updatePasswordHash(id, await hashPassword(password)))) {
      throw new ApiError(status.FORBIDDEN, "Reset link is invalid or expired", ErrorCode.FORBIDDEN);
    }
    logger.info(`[${CONTEXT}] Password reset for student ${id}`);
  },

  async toggleBlocked(id: string): Promise<IStudent> {
    const student = await students.toggleBlocked(id);
    if (!student) throw new ApiError(status.NOT_FOUND, `Student ${id} not found`, ErrorCode.NOT_FOUND);
    return student;
  },

  async isActive(id: string): Promise<boolean> {
    const student = await students.findById(id);
    return student !== null && !student.isBlocked;
  },
});

export type StudentService = ReturnType<typeof createStudentService>;
