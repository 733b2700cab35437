import { isValidObjectId } from "mongoose";
import { guardStore } from "@/errors";
import { IStudent, NewStudent, StudentStore, StudentWithSecret } from "./student.interface";
import { LeanStudent, Student, toStudent, toStudentWithSecret } from "./student.model";

const CONTEXT = "STUDENT_STORE";

export const mongoStudentStore: StudentStore = {
  async create(input: NewStudent): Promise<IStudent> {
    return guardStore(CONTEXT, async () => {
      const doc = await Student.create(input);
      return toStudent(doc.toObject<LeanStudent>({ transform: false }));
    });
  },

  async findById(id: string): Promise<IStudent | null> {
    if (!isValidObjectId(id)) return null;
    return guardStore(CONTEXT, async () => {
      const doc = await Student.findById(id).lean<LeanStudent>();
      return doc ? toStudent(doc) : null;
    });
  },

  async findForLogin(identifier: string): Promise<StudentWithSecret | null> {
    const value = identifier.trim();
    return guardStore(CONTEXT, async () => {
      const doc = await Student.findOne({
        $or: [{ email: value.toLowerCase() }, { studentId: value }],
      }).lean<LeanStudent>();
      return doc ? toStudentWithSecret(doc) : null;
    });
  },

  async existsByEmailOrStudentId(email: string, studentId: string): Promise<boolean> {
    return guardStore(CONTEXT, async () => {
      const found = await Student.exists({ $or: [{ email: email.toLowerCase() }, { studentId }] });
      return found !== null;
    });
  },

  async toggleBlocked(id: string): Promise<IStudent | null> {
    if (!isValidObjectId(id)) return null;
    return guardStore(CONTEXT, async () => {
      const doc = await Student.findByIdAndUpdate(id, [{ $set: { isBlocked: { $not: "$isBlocked" } } }], { new: true }).lean<LeanStudent>();
      return doc ? toStudent(doc) : null;
    });
  },

  async updatePasswordHash(id: string, passwordHash: string): Promise<boolean> {
    if (!isValidObjectId(id)) return false;
    return guardStore(CONTEXT, async () => {
      const { matchedCount } = await Student.updateOne({ _id: id }, { $set: { passwordHash } });
      return matchedCount > 0;
    });
  },
};
