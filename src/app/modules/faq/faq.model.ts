import mongoose, { Schema, Types } from "mongoose";
import applyMongooseToJSON from "@/utils/mongooseToJSON";
import { IFaq } from "./faq.interface";

export interface FaqAttrs {
  question: string;
  normalizedQuestion: string;
  answer: string | null;
  category: string | null;
  frequency: number;
  isActive: boolean;
  fromQueryId: Types.ObjectId | null;
  createdAt: Date;
  updatedAt: Date;
}

export type LeanFaq = FaqAttrs & { _id: Types.ObjectId };

const faqSchema = new Schema<FaqAttrs>(
  {
    question: { type: String, required: true, trim: true },
    normalizedQuestion: { type: String, required: true },
    answer: { type: String, default: null },
    category: { type: String, default: null, trim: true },
    frequency: { type: Number, default: 1, min: 1 },
    isActive: { type: Boolean, default: true },
    fromQueryId: { type: Schema.Types.ObjectId, ref: "Query", default: null },
  },
  { timestamps: true }
);

applyMongooseToJSON(faqSchema);

faqSchema.index({ normalizedQuestion: 1 }, { unique: true });
faqSchema.index({ isActive: 1, frequency: -1, createdAt: 1 });
faqSchema.index({ category: 1, frequency: -1 });

export const Faq: mongoose.Model<FaqAttrs> =
  mongoose.models.Faq || mongoose.model<FaqAttrs>("Faq", faqSchema);

export const toFaq = (doc: LeanFaq): IFaq => ({
  id: doc._id.toString(),
  question: doc.question,
  normalizedQuestion: doc.normalizedQuestion,
  answer: doc.answer ?? null,
  category: doc.category ?? null,
  frequency: doc.frequency,
  isActive: doc.isActive ?? true,
  fromQueryId: doc.fromQueryId ? doc.fromQueryId.toString() : null,
  createdAt: doc.createdAt,
  updatedAt: doc.updatedAt,
});
