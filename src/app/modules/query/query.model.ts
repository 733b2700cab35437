import mongoose, { Schema, Types } from "mongoose";
import applyMongooseToJSON from "@/utils/mongooseToJSON";
import { IQuery, QUERY_STATUSES, QueryStatus } from "./query.interface";

export interface QueryAttrs {
  requesterName: string;
  requesterEmail: string;
  requesterIdentity: Types.ObjectId | null;
  category: string | null;
  message: string;
  status: QueryStatus;
  adminResponse: string | null;
  adminReplyAt: Date | null;
  adminReplySeen: boolean;
  resolvedAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

export type LeanQuery = QueryAttrs & { _id: Types.ObjectId };

const querySchema = new Schema<QueryAttrs>(
  {
    requesterName: { type: String, required: true, trim: true, immutable: true },
    requesterEmail: { type: String, required: true, trim: true, lowercase: true, immutable: true },
    requesterIdentity: { type: Schema.Types.ObjectId, ref: "Student", default: null, immutable: true },
    category: { type: String, default: null, trim: true, immutable: true },
    message: { type: String, required: true, immutable: true },
    status: { type: String, enum: QUERY_STATUSES, default: "pending" },
    adminResponse: { type: String, default: null },
    adminReplyAt: { type: Date, default: null },
    adminReplySeen: { type: Boolean, default: false },
    resolvedAt: { type: Date, default: null },
  },
  { timestamps: true }
);

applyMongooseToJSON(querySchema);

querySchema.index({ status: 1, createdAt: -1 });
querySchema.index({ category: 1, createdAt: -1 });
querySchema.index({ requesterIdentity: 1, createdAt: -1 });
querySchema.index({ requesterEmail: 1, createdAt: -1 });
querySchema.index({ createdAt: -1 });

export const Query: mongoose.Model<QueryAttrs> =
  mongoose.models.Query || mongoose.model<QueryAttrs>("Query", querySchema);

export const toQuery = (doc: LeanQuery): IQuery => ({
  id: doc._id.toString(),
  requesterName: doc.requesterName,
  requesterEmail: doc.requesterEmail,
  requesterIdentity: doc.requesterIdentity ? doc.requesterIdentity.toString() : null,
  category: doc.category ?? null,
  message: doc.message,
  status: doc.status,
  adminResponse: doc.adminResponse ?? null,
  adminReplyAt: doc.adminReplyAt ?? null,
  adminReplySeen: doc.adminReplySeen ?? false,
  createdAt: doc.createdAt,
  updatedAt: doc.updatedAt,
  resolvedAt: doc.resolvedAt ?? null,
});
