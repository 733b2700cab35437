import mongoose, { Schema, Types } from "mongoose";
import applyMongooseToJSON from "@/utils/mongooseToJSON";
import { IStudent, StudentWithSecret } from "./student.interface";

export interface StudentAttrs {
  studentId: string;
  name: string;
  email: string;
  passwordHash: string;
  isBlocked: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export type LeanStudent = StudentAttrs & { _id: Types.ObjectId };

const studentSchema = new Schema<StudentAttrs>(
  {
    studentId: { type: String, required: true, trim: true },
    name: { type: String, required: true, trim: true },
    email: { type: String, required: true, trim: true, lowercase: true },
    passwordHash: { type: String, required: true },
    isBlocked: { type: Boolean, default: false },
  },
  { timestamps: true }
);

applyMongooseToJSON(studentSchema, ["passwordHash"]);

studentSchema.index({ studentId: 1 }, { unique: true });
studentSchema.index({ email: 1 }, { unique: true });

export const Student: mongoose.Model<StudentAttrs> =
  mongoose.models.Student || mongoose.model<StudentAttrs>("Student", studentSchema);

export const toStudent = (doc: LeanStudent): IStudent => ({
  id: doc._id.toString(),
  studentId: doc.studentId,
  name: doc.name,
  email: doc.email,
  isBlocked: doc.isBlocked ?? false,
  createdAt: doc.createdAt,
});

export const toStudentWithSecret = (doc: LeanStudent): StudentWithSecret => ({
  ...toStudent(doc),
  passwordHash: doc.passwordHash,
});
