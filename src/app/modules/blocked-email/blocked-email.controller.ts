import status from "http-status";
import { getApiResponseClass } from "@/interface";
import { asyncHandler } from "@/utils";
import { blockedEmailService } from "@/container";

const ApiResponse = getApiResponseClass("BLOCKED_EMAIL");

export const getBlockedEmails = asyncHandler(async (req, res) => {
  const entries = await blockedEmailService.list();
  res.status(status.OK).json(new ApiResponse(status.OK, "Blocked emails retrieved successfully", entries));
});

export const toggleBlockedEmail = asyncHandler(async (req, res) => {
  const entry = await blockedEmailService.toggle(req.body);
  res.status(status.OK).json(
    new ApiResponse(status.OK, `Email ${entry.isActive ? "blocked" : "unblocked"} successfully`, entry)
  );
});
