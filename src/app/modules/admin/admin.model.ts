import mongoose, { Schema, Types } from "mongoose";
import applyMongooseToJSON from "@/utils/mongooseToJSON";
import { AdminWithSecret, IAdmin } from "./admin.interface";

export interface AdminAttrs {
  username: string;
  email: string;
  name: string;
  passwordHash: string;
  isActive: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export type LeanAdmin = AdminAttrs & { _id: Types.ObjectId };

const adminSchema = new Schema<AdminAttrs>(
  {
    username: { type: String, required: true, trim: true },
    email: { type: String, required: true, trim: true, lowercase: true },
    name: { type: String, required: true, trim: true },
    passwordHash: { type: String, required: true },
    isActive: { type: Boolean, default: true },
  },
  { timestamps: true }
);

applyMongooseToJSON(adminSchema, ["passwordHash"]);

adminSchema.index({ username: 1 }, { unique: true });
adminSchema.index({ email: 1 }, { unique: true });

export const Admin: mongoose.Model<AdminAttrs> =
  mongoose.models.Admin || mongoose.model<AdminAttrs>("Admin", adminSchema);

export const toAdmin = (doc: LeanAdmin): IAdmin => ({
  id: doc._id.toString(),
  username: doc.username,
  email: doc.email,
  name: doc.name,
  isActive: doc.isActive ?? true,
  createdAt: doc.createdAt,
});

export const toAdminWithSecret = (doc: LeanAdmin): AdminWithSecret => ({
  ...toAdmin(doc),
  passwordHash: doc.passwordHash,
});
