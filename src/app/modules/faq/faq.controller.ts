import status from "http-status";
import { getApiResponseClass } from "@/interface";
import { asyncHandler } from "@/utils";
import { faqService } from "@/container";

const ApiResponse = getApiResponseClass("FAQ");

export const getPublicFaqs = asyncHandler(async (req, res) => {
  const faqs = await faqService.listFaqs(req.query);
  res.status(status.OK).json(new ApiResponse(status.OK, "FAQs retrieved successfully", faqs));
});

export const getAllFaqs = asyncHandler(async (req, res) => {
  const faqs = await faqService.listFaqs(req.query, { includeInactive: true });
  res.status(status.OK).json(new ApiResponse(status.OK, "FAQs retrieved successfully", faqs));
});

export const getFaqById = asyncHandler(async (req, res) => {
  const faq = await faqService.getFaq(req.params.id);
  res.status(status.OK).json(new ApiResponse(status.OK, "FAQ retrieved successfully", faq));
});

export const createFaq = asyncHandler(async (req, res) => {
  const faq = await faqService.createFaq(req.body);
  res.status(status.CREATED).json(new ApiResponse(status.CREATED, "FAQ created successfully", faq));
});

export const updateFaqAnswer = asyncHandler(async (req, res) => {
  const faq = await faqService.setAnswer(req.params.id, req.body);
  res.status(status.OK).json(new ApiResponse(status.OK, "FAQ updated successfully", faq));
});

export const toggleFaqActive = asyncHandler(async (req, res) => {
  const faq = await faqService.toggleActive(req.params.id);
  res.status(status.OK).json(
    new ApiResponse(status.OK, `FAQ ${faq.isActive ? "published" : "hidden"} successfully`, faq)
  );
});
