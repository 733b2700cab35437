import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ErrorCode } from "@/interface";
import { generateResetToken, verifyToken } from "@/utils/generateToken";
import { createStudentService } from "./student.service";
import { MemoryStudentStore } from "../../../test/memoryAccountStores";
import { expectApiError } from "../../../test/expectApiError";
import { RecordingMailer } from "../../../test/recordingMailer";

const signup = { studentId: "S-2026-01", name: "Ravi Kumar", email: "Ravi@Example.com", password: "Student@1" };

describe("student service", () => {
  let students: MemoryStudentStore;
  let service: ReturnType<typeof createStudentService>;

  beforeEach(() => {
    students = new MemoryStudentStore();
    service = createStudentService({ students });
  });

  it("signs up with a lower-cased e-mail", async () => {
    const student = await service.signup(signup);
    expect(student).toMatchObject({ studentId: "S-2026-01", email: "ravi@example.com", isBlocked: false });
  });

  it("refuses a second account for the same id or e-mail", async () => {
    await service.signup(signup);
    await expectApiError(service.signup({ ...signup, email: "other@example.com" }), 409, ErrorCode.CONFLICT);
    await expectApiError(service.signup({ ...signup, studentId: "S-2026-02" }), 409, ErrorCode.CONFLICT);
  });

  it("requires a password with a letter, a digit and a symbol", async () => {
    await expectApiError(service.signup({ ...signup, password: "password1" }), 400, ErrorCode.VALIDATION_ERROR);
  });

  it("logs in by student id or e-mail", async () => {
    const student = await service.signup(signup);

    const byId = await service.login({ identifier: "S-2026-01", password: "Student@1" });
    const byEmail = await service.login({ identifier: "ravi@example.com", password: "Student@1" });

    expect(byId.student.id).toBe(student.id);
    expect(byEmail.student.id).toBe(student.id);
    expect(verifyToken(byId.token)).toEqual({ id: student.id, role: "student", name: "Ravi Kumar" });
  });

  it("refuses blocked students and wrong passwords", async () => {
    const student = await service.signup(signup);
    await expectApiError(service.login({ identifier: "S-2026-01", password: "Wrong@123" }), 403, ErrorCode.FORBIDDEN);

    await service.toggleBlocked(student.id);
    const error = await expectApiError(service.login({ identifier: "S-2026-01", password: "Student@1" }), 403, ErrorCode.FORBIDDEN);
    expect(error.message).toBe("Your account has been blocked");
    expect(await service.isActive(student.id)).toBe(false);
  });

  it("toggles the block flag back and forth", async () => {
    const student = await service.signup(signup);
    expect((await service.toggleBlocked(student.id)).isBlocked).toBe(true);
    expect((await service.toggleBlocked(student.id)).isBlocked).toBe(false);
  });

  it("reports unknown students as not found", async () => {
    await expectApiError(service.toggleBlocked("missing"), 404, ErrorCode.NOT_FOUND);
  });
});

describe("student password reset", () => {
  let students: MemoryStudentStore;
  let mailer: RecordingMailer;
  let service: ReturnType<typeof createStudentService>;

  beforeEach(async () => {
    students = new MemoryStudentStore();
    mailer = new RecordingMailer();
    service = createStudentService({ students, mailer: mailer.send });
    await service.signup(signup);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("mails a reset link by student id and sets the new password", async () => {
    await service.forgotPassword({ identifier: "S-2026-01" });

    expect(mailer.sent.map((m) => [m.to, m.subject])).toEqual([["ravi@example.com", "Query Desk Student Password Reset"]]);
    expect(mailer.sent[0].text).toContain("http://localhost:3000/student/reset-password?token=");

    await service.resetPassword({ token: mailer.lastResetToken(), password: "Fresh@456", confirmPassword: "Fresh@456" });

    await expectApiError(service.login({ identifier: "S-2026-01", password: "Student@1" }), 403, ErrorCode.FORBIDDEN);
    const { student } = await service.login({ identifier: "S-2026-01", password: "Fresh@456" });
    expect(student.email).toBe("ravi@example.com");
  });

  it("answers unknown identifiers without sending mail", async () => {
    await service.forgotPassword({ identifier: "nobody@example.com" });
    expect(mailer.sent).toHaveLength(0);
  });

  it("rejects a link older than an hour", async () => {
    vi.useFakeTimers({ toFake: ["Date"] });
    vi.setSystemTime(new Date("2026-03-01T10:00:00.000Z"));
    await service.forgotPassword({ identifier: "ravi@example.com" });
    const token = mailer.lastResetToken();

    vi.setSystemTime(new Date("2026-03-01T11:00:01.000Z"));

    await expectApiError(service.resetPassword({ token, password: "Fresh@456", confirmPassword: "Fresh@456" }), 403, ErrorCode.FORBIDDEN);
  });

  it("rejects an admin's reset token", async () => {
    const [stored] = [...students.rows.values()];
    const adminToken = generateResetToken({ id: stored.id, role: "admin" });

    await expectApiError(service.resetPassword({ token: adminToken, password: "Fresh@456", confirmPassword: "Fresh@456" }), 403, ErrorCode.FORBIDDEN);
  });

  it("rejects a token for a student that no longer exists", async () => {
    await service.forgotPassword({ identifier: "S-2026-01" });
    const token = mailer.lastResetToken();
    students.rows.clear();

    await expectApiError(service.resetPassword({ token, password: "Fresh@456", confirmPassword: "Fresh@456" }), 403, ErrorCode.FORBIDDEN);
  });
});
