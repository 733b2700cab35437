import { isValidObjectId, Types, type FilterQuery } from "mongoose";
import status from "http-status";
import { guardStore, isDuplicateKeyError } from "@/errors";
import { ErrorCode, getApiErrorClass } from "@/interface";
import { FaqListFilter, FaqPatch, FaqStore, IFaq, NewFaq, RecordedSubmission } from "./faq.interface";
import { Faq, FaqAttrs, LeanFaq, toFaq } from "./faq.model";

const CONTEXT = "FAQ_STORE";
const ApiError = getApiErrorClass(CONTEXT);

const toObjectId = (id: string | null) => (id && isValidObjectId(id) ? new Types.ObjectId(id) : null);

export const mongoFaqStore: FaqStore = {
  async recordSubmission(question: string, normalizedQuestion: string, category: string | null): Promise<RecordedSubmission> {
    // single atomic upsert; the unique index on normalizedQuestion serializes racing inserts
    const upsert = () =>
      Faq.findOneAndUpdate(
        { normalizedQuestion },
        {
          $inc: { frequency: 1 },
          $setOnInsert: { question, answer: null, category, isActive: true, fromQueryId: null },
        },
        { upsert: true, new: true, setDefaultsOnInsert: false }
      ).lean<LeanFaq>();

    return guardStore(CONTEXT, async () => {
      let doc: LeanFaq | null;
      try {
        doc = await upsert();
      } catch (err) {
        // lost an insert race: the entry exists now, so the retry increments it
        if (!isDuplicateKeyError(err)) throw err;
        doc = await upsert();
      }
      if (!doc) {
        throw new ApiError(status.INTERNAL_SERVER_ERROR, `FAQ upsert returned nothing for "${normalizedQuestion}"`);
      }
      return { faq: toFaq(doc), created: doc.frequency === 1 };
    });
  },

  async findById(id: string): Promise<IFaq | null> {
    if (!isValidObjectId(id)) return null;
    return guardStore(CONTEXT, async () => {
      const doc = await Faq.findById(id).lean<LeanFaq>();
      return doc ? toFaq(doc) : null;
    });
  },

  async findByNormalizedQuestion(normalizedQuestion: string): Promise<IFaq | null> {
    return guardStore(CONTEXT, async () => {
      const doc = await Faq.findOne({ normalizedQuestion }).lean<LeanFaq>();
      return doc ? toFaq(doc) : null;
    });
  },

  async list(filter: FaqListFilter): Promise<IFaq[]> {
    const mongoFilter: FilterQuery<FaqAttrs> = {};
    if (!filter.includeInactive) mongoFilter.isActive = true;
    if (filter.category) mongoFilter.category = filter.category;
    return guardStore(CONTEXT, async () => {
      const docs = await Faq.find(mongoFilter).sort({ frequency: -1, createdAt: 1, _id: 1 }).lean<LeanFaq[]>();
      return docs.map(toFaq);
    });
  },

  async create(input: NewFaq): Promise<IFaq> {
    return guardStore(CONTEXT, async () => {
      try {
        const doc = await Faq.create({
          ...input,
          fromQueryId: toObjectId(input.fromQueryId),
          frequency: 1,
          isActive: true,
        });
        return toFaq(doc.toObject<LeanFaq>({ transform: false }));
      } catch (err) {
        if (isDuplicateKeyError(err)) {
          throw new ApiError(status.CONFLICT, "An FAQ with this question already exists", ErrorCode.CONFLICT);
        }
        throw err;
      }
    });
  },

  async update(id: string, patch: FaqPatch): Promise<IFaq | null> {
    if (!isValidObjectId(id)) return null;
    const set: Record<string, unknown> = {};
    if (patch.answer !== undefined) set.answer = patch.answer;
    if (patch.category !== undefined) set.category = patch.category;
    if (patch.fromQueryId !== undefined) set.fromQueryId = toObjectId(patch.fromQueryId);
    return guardStore(CONTEXT, async () => {
      const doc = await Faq.findByIdAndUpdate(id, { $set: set }, { new: true, runValidators: true }).lean<LeanFaq>();
      return doc ? toFaq(doc) : null;
    });
  },

  async toggleActive(id: string): Promise<IFaq | null> {
    if (!isValidObjectId(id)) return null;
    return guardStore(CONTEXT, async () => {
      const doc = await Faq.findByIdAndUpdate(id, [{ $set: { isActive: { $not: "$isActive" } } }], { new: true }).lean<LeanFaq>();
      return doc ? toFaq(doc) : null;
    });
  },
};
