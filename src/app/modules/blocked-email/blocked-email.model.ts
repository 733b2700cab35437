import mongoose, { Schema, Types } from "mongoose";
import applyMongooseToJSON from "@/utils/mongooseToJSON";
import { IBlockedEmail } from "./blocked-email.interface";

export interface BlockedEmailAttrs {
  email: string;
  isActive: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export type LeanBlockedEmail = BlockedEmailAttrs & { _id: Types.ObjectId };

const blockedEmailSchema = new Schema<BlockedEmailAttrs>(
  {
    email: { type: String, required: true, trim: true, lowercase: true },
    isActive: { type: Boolean, default: true },
  },
  { timestamps: true }
);

applyMongooseToJSON(blockedEmailSchema);

blockedEmailSchema.index({ email: 1 }, { unique: true });

export const BlockedEmail: mongoose.Model<BlockedEmailAttrs> =
  mongoose.models.BlockedEmail || mongoose.model<BlockedEmailAttrs>("BlockedEmail", blockedEmailSchema);

export const toBlockedEmail = (doc: LeanBlockedEmail): IBlockedEmail => ({
  id: doc._id.toString(),
  email: doc.email,
  isActive: doc.isActive ?? true,
  createdAt: doc.createdAt,
});
