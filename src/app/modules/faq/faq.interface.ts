export interface IFaq {
  id: string;
  question: string;
  /** Matching key; unique across all entries. */
  normalizedQuestion: string;
  answer: string | null;
  category: string | null;
  frequency: number;
  isActive: boolean;
  fromQueryId: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface NewFaq {
  question: string;
  normalizedQuestion: string;
  answer: string | null;
  category: string | null;
  fromQueryId: string | null;
}

export type FaqPatch = Partial<Pick<IFaq, "answer" | "category" | "fromQueryId">>;

export interface FaqListFilter {
  category?: string;
  includeInactive: boolean;
}

export interface RecordedSubmission {
  faq: IFaq;
  created: boolean;
}

export interface FaqStore {
  /**
   * Increments the entry keyed by `normalizedQuestion`, or creates it with
   * frequency 1. Must be atomic per key.
   */
  recordSubmission(question: string, normalizedQuestion: string, category: string | null): Promise<RecordedSubmission>;
  findById(id: string): Promise<IFaq | null>;
  findByNormalizedQuestion(normalizedQuestion: string): Promise<IFaq | null>;
  /** Ordered by frequency desc, then creation order. */
  list(filter: FaqListFilter): Promise<IFaq[]>;
  /** Rejects with CONFLICT when the key is taken. */
  create(input: NewFaq): Promise<IFaq>;
  update(id: string, patch: FaqPatch): Promise<IFaq | null>;
  toggleActive(id: string): Promise<IFaq | null>;
}
