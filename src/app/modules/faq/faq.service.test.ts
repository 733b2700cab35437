import { beforeEach, describe, expect, it } from "vitest";
import { ErrorCode } from "@/interface";
import { createFaqService, normalizeQuestion } from "./faq.service";
import { MemoryFaqStore } from "../../../test/memoryFaqStore";
import { MemoryQueryStore } from "../../../test/memoryQueryStore";
import { expectApiError } from "../../../test/expectApiError";

const setup = () => {
  let now = new Date("2026-04-10T08:00:00.000Z");
  const clock = () => now;
  const faqs = new MemoryFaqStore(clock);
  const queries = new MemoryQueryStore(clock);
  const service = createFaqService({ faqs, queries });
  const advance = (ms: number) => {
    now = new Date(now.getTime() + ms);
  };
  return { service, faqs, queries, advance };
};

type Setup = ReturnType<typeof setup>;

describe("normalizeQuestion", () => {
  it("trims, collapses whitespace and folds case", () => {
    expect(normalizeQuestion("  What   is\tthe FEE?\n")).toBe("what is the fee?");
  });
});

describe("faq service: recordSubmission", () => {
  let ctx: Setup;
  beforeEach(() => {
    ctx = setup();
  });

  it("creates an entry with frequency 1 on first sight", async () => {
    const { faq, created } = await ctx.service.recordSubmission("  What is the fee? ", "fees");

    expect(created).toBe(true);
    expect(faq).toMatchObject({
      question: "What is the fee?",
      normalizedQuestion: "what is the fee?",
      answer: null,
      category: "fees",
      frequency: 1,
      isActive: true,
    });
  });

  it("increments the matching entry and keeps its original wording", async () => {
    await ctx.service.recordSubmission("What is the fee?", "fees");
    const { faq, created } = await ctx.service.recordSubmission("what IS the   fee?", null);

    expect(created).toBe(false);
    expect(faq.frequency).toBe(2);
    expect(faq.question).toBe("What is the fee?");
    expect(faq.category).toBe("fees");
  });

  it("keeps one entry under concurrent identical submissions", async () => {
    const results = await Promise.all(
      Array.from({ length: 10 }, () => ctx.service.recordSubmission("Is there a hostel?", null))
    );

    expect(ctx.faqs.rows.size).toBe(1);
    expect([...ctx.faqs.rows.values()][0].frequency).toBe(10);
    expect(results.filter((r) => r.created)).toHaveLength(1);
  });

  it("keeps counting entries an admin has hidden", async () => {
    const { faq } = await ctx.service.recordSubmission("Is there a hostel?", null);
    await ctx.service.toggleActive(faq.id);

    const { faq: again } = await ctx.service.recordSubmission("Is there a hostel?", null);

    expect(again.frequency).toBe(2);
    expect(again.isActive).toBe(false);
  });

  it("refuses a blank message", async () => {
    await expectApiError(ctx.service.recordSubmission("   ", null), 400, ErrorCode.VALIDATION_ERROR);
    expect(ctx.faqs.rows.size).toBe(0);
  });
});

describe("faq service: curation", () => {
  let ctx: Setup;
  beforeEach(() => {
    ctx = setup();
  });

  it("lists by frequency, then oldest first", async () => {
    await ctx.service.recordSubmission("Fee?", "fees");
    ctx.advance(1000);
    await ctx.service.recordSubmission("Hostel?", "hostel");
    ctx.advance(1000);
    await ctx.service.recordSubmission("Library hours?", null);
    await ctx.service.recordSubmission("Library hours?", null);

    const faqs = await ctx.service.listFaqs();

    expect(faqs.map((f) => f.question)).toEqual(["Library hours?", "Fee?", "Hostel?"]);
  });

  it("hides inactive entries from the public list only", async () => {
    const { faq } = await ctx.service.recordSubmission("Fee?", "fees");
    await ctx.service.recordSubmission("Hostel?", "hostel");
    await ctx.service.toggleActive(faq.id);

    const publicList = await ctx.service.listFaqs();
    const adminList = await ctx.service.listFaqs({}, { includeInactive: true });

    expect(publicList.map((f) => f.question)).toEqual(["Hostel?"]);
    expect(adminList.map((f) => f.question).sort()).toEqual(["Fee?", "Hostel?"]);
  });

  it("filters by category", async () => {
    await ctx.service.recordSubmission("Fee?", "fees");
    await ctx.service.recordSubmission("Hostel?", "hostel");

    const faqs = await ctx.service.listFaqs({ category: "hostel" });

    expect(faqs.map((f) => f.question)).toEqual(["Hostel?"]);
  });

  it("sets an answer without touching the frequency", async () => {
    const { faq } = await ctx.service.recordSubmission("Fee?", "fees");
    await ctx.service.recordSubmission("fee?", null);

    const updated = await ctx.service.setAnswer(faq.id, { answer: " Rs. 10,000 per term. ", category: "finance" });

    expect(updated).toMatchObject({ answer: "Rs. 10,000 per term.", category: "finance", frequency: 2 });
  });

  it("leaves the category alone when none is given", async () => {
    const { faq } = await ctx.service.recordSubmission("Fee?", "fees");

    const updated = await ctx.service.setAnswer(faq.id, { answer: "Rs. 10,000." });

    expect(updated.category).toBe("fees");
  });

  it("fetches one entry by id, hidden or not", async () => {
    const { faq } = await ctx.service.recordSubmission("Fee?", "fees");
    await ctx.service.toggleActive(faq.id);

    expect(await ctx.service.getFaq(faq.id)).toMatchObject({ id: faq.id, question: "Fee?", isActive: false, frequency: 1 });
  });

  it("reports unknown ids as not found", async () => {
    await expectApiError(ctx.service.getFaq("missing"), 404, ErrorCode.NOT_FOUND);
    await expectApiError(ctx.service.setAnswer("missing", { answer: "x" }), 404, ErrorCode.NOT_FOUND);
    await expectApiError(ctx.service.toggleActive("missing"), 404, ErrorCode.NOT_FOUND);
  });

  it("creates admin-authored entries and refuses duplicates", async () => {
    const faq = await ctx.service.createFaq({ question: "Where is the office?", answer: "Block A." });
    expect(faq).toMatchObject({ normalizedQuestion: "where is the office?", frequency: 1, answer: "Block A.", category: null });

    await expectApiError(ctx.service.createFaq({ question: "WHERE is the office?" }), 409, ErrorCode.CONFLICT);
  });
});

describe("faq service: promoteQuery", () => {
  it("creates an entry from a query with its response as the answer", async () => {
    const ctx = setup();
    const query = ctx.queries.insert({
      requesterName: "Asha",
      requesterEmail: "asha@example.com",
      requesterIdentity: null,
      category: "transport",
      message: "Is there a college bus?",
      adminResponse: "Yes, from the city centre.",
    });

    const { faq, created } = await ctx.service.promoteQuery(query.id);

    expect(created).toBe(true);
    expect(faq).toMatchObject({
      question: "Is there a college bus?",
      answer: "Yes, from the city centre.",
      category: "transport",
      fromQueryId: query.id,
    });
  });

  it("links to the existing entry instead of duplicating it", async () => {
    const ctx = setup();
    const { faq: existing } = await ctx.service.recordSubmission("Is there a college bus?", null);
    const query = ctx.queries.insert({
      requesterName: "Asha",
      requesterEmail: "asha@example.com",
      requesterIdentity: null,
      category: null,
      message: "is there a college  bus?",
      adminResponse: "Yes.",
    });

    const { faq, created } = await ctx.service.promoteQuery(query.id);

    expect(created).toBe(false);
    expect(ctx.faqs.rows.size).toBe(1);
    expect(faq).toMatchObject({ id: existing.id, answer: "Yes.", fromQueryId: query.id, frequency: 1 });
  });

  it("reports an unknown query as not found", async () => {
    const ctx = setup();
    await expectApiError(ctx.service.promoteQuery("missing"), 404, ErrorCode.NOT_FOUND);
  });
});
