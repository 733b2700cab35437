import status from "http-status";
import { ErrorCode, getApiErrorClass } from "@/interface";
import { parseWith } from "@/utils/parseWith";
import { logger } from "@/config/logger";
import type { QueryStore } from "../query/query.interface";
import type { FaqStore, IFaq, RecordedSubmission } from "./faq.interface";
import { createFaqValidation, listFaqsValidation, setAnswerValidation } from "./faq.validation";

const CONTEXT = "FAQ";
const ApiError = getApiErrorClass(CONTEXT);

/**
 * Matching key for FAQ aggregation: surrounding whitespace trimmed, inner
 * whitespace runs collapsed, case folded.
 */
export const normalizeQuestion = (text: string) => text.trim().replace(/\s+/g, " ").toLowerCase();

export interface FaqServiceDeps {
  faqs: FaqStore;
  queries: Pick<QueryStore, "findById">;
}

export const createFaqService = ({ faqs, queries }: FaqServiceDeps) => {
  const requireFaq = (faq: IFaq | null, id: string): IFaq => {
    if (!faq) throw new ApiError(status.NOT_FOUND, `FAQ ${id} not found`, ErrorCode.NOT_FOUND);
    return faq;
  };

  return {
    /** Counts one more submission of `message`; creates the entry on first sight. */
    async recordSubmission(message: string, category: string | null): Promise<RecordedSubmission> {
      const question = message.trim();
      const key = normalizeQuestion(question);
      if (!key) {
        throw new ApiError(status.BAD_REQUEST, "Cannot aggregate an empty message", ErrorCode.VALIDATION_ERROR);
      }
      const result = await faqs.recordSubmission(question, key, category);
      logger.debug(`[${CONTEXT}] ${result.created ? "Created" : "Incremented"} FAQ ${result.faq.id} (frequency ${result.faq.frequency})`);
      return result;
    },

    async listFaqs(filter: unknown = {}, { includeInactive = false }: { includeInactive?: boolean } = {}) {
      const { category } = parseWith(listFaqsValidation, filter, CONTEXT);
      return faqs.list({ category, includeInactive });
    },

    async getFaq(id: string) {
      return requireFaq(await faqs.findById(id), id);
    },

    /** Curates answer/category; frequency is never touched here. */
    async setAnswer(id: string, body: unknown) {
      const { answer, category } = parseWith(setAnswerValidation, body, CONTEXT);
      const updated = await faqs.update(id, category === undefined ? { answer } : { answer, category });
      return requireFaq(updated, id);
    },

    async createFaq(body: unknown) {
      const { question, answer, category } = parseWith(createFaqValidation, body, CONTEXT);
      const key = normalizeQuestion(question);
      if (await faqs.findByNormalizedQuestion(key)) {
        throw new ApiError(status.CONFLICT, "An FAQ with this question already exists", ErrorCode.CONFLICT);
      }
      return faqs.create({
        question,
        normalizedQuestion: key,
        answer: answer ?? null,
        category: category ?? null,
        fromQueryId: null,
      });
    },

    async toggleActive(id: string) {
      return requireFaq(await faqs.toggleActive(id), id);
    },

    /**
     * Turns a query into an FAQ entry. Reuses the entry already keyed by the
     * query's message, filling in its answer from the admin response.
     */
    async promoteQuery(queryId: string): Promise<RecordedSubmission> {
      const query = await queries.findById(queryId);
      if (!query) throw new ApiError(status.NOT_FOUND, `Query ${queryId} not found`, ErrorCode.NOT_FOUND);

      const question = query.message.trim();
      const key = normalizeQuestion(question);
      const existing = await faqs.findByNormalizedQuestion(key);
      if (existing) {
        const updated = await faqs.update(existing.id, {
          answer: existing.answer ?? query.adminResponse,
          fromQueryId: existing.fromQueryId ?? query.id,
        });
        return { faq: requireFaq(updated, existing.id), created: false };
      }
      const faq = await faqs.create({
        question,
        normalizedQuestion: key,
        answer: query.adminResponse,
        category: query.category,
        fromQueryId: query.id,
      });
      return { faq, created: true };
    },
  };
};

export type FaqService = ReturnType<typeof createFaqService>;
