import status from "http-status";
import { getApiErrorClass, getApiResponseClass } from "@/interface";
import { asyncHandler, parseWith } from "@/utils";
import { faqService, queryService } from "@/container";
import { trackQueriesValidation } from "./query.validation";

const ApiError = getApiErrorClass("QUERY");
const ApiResponse = getApiResponseClass("QUERY");

export const submitQuery = asyncHandler(async (req, res) => {
  const query = await queryService.create(req.body, req.user?.id ?? null);
  res.status(status.CREATED).json(new ApiResponse(status.CREATED, "Query submitted successfully", query));
});

export const getMyQueries = asyncHandler(async (req, res) => {
  if (!req.user) {
    throw new ApiError(status.FORBIDDEN, "Authentication required");
  }
  const queries = await queryService.listByRequester({ identity: req.user.id });
  res.status(status.OK).json(new ApiResponse(status.OK, "Queries retrieved successfully", queries));
});

export const trackQueries = asyncHandler(async (req, res) => {
  const { email } = parseWith(trackQueriesValidation, req.body, "QUERY");
  const queries = await queryService.listByRequester({ email });
  res.status(status.OK).json(new ApiResponse(status.OK, "Queries retrieved successfully", queries));
});

export const getAllQueries = asyncHandler(async (req, res) => {
  const page = await queryService.list(req.query);
  res.status(status.OK).json(new ApiResponse(status.OK, "Queries retrieved successfully", page));
});

export const getQueryById = asyncHandler(async (req, res) => {
  const query = await queryService.get(req.params.id);
  res.status(status.OK).json(new ApiResponse(status.OK, "Query retrieved successfully", query));
});

export const updateQuery = asyncHandler(async (req, res) => {
  const { query, responseChanged } = await queryService.update(req.params.id, req.body);
  res.status(status.OK).json(
    new ApiResponse(status.OK, responseChanged ? "Query updated and requester notified" : "Query updated successfully", query)
  );
});

export const deleteQuery = asyncHandler(async (req, res) => {
  await queryService.delete(req.params.id);
  res.status(status.OK).json(new ApiResponse(status.OK, "Query deleted successfully"));
});

export const promoteQueryToFaq = asyncHandler(async (req, res) => {
  const { faq, created } = await faqService.promoteQuery(req.params.id);
  const code = created ? status.CREATED : status.OK;
  res.status(code).json(new ApiResponse(code, created ? "FAQ created from query" : "Query linked to existing FAQ", faq));
});
