import status from "http-status";
import { getApiResponseClass } from "@/interface";
import { asyncHandler } from "@/utils";
import { dashboardService } from "@/container";

const ApiResponse = getApiResponseClass("DASHBOARD");

export const getDashboardOverview = asyncHandler(async (req, res) => {
  const overview = await dashboardService.overview(req.query);
  res.status(status.OK).json(new ApiResponse(status.OK, "Dashboard retrieved successfully", overview));
});

export const getDashboardCounts = asyncHandler(async (req, res) => {
  const counts = await dashboardService.counts();
  res.status(status.OK).json(new ApiResponse(status.OK, "Dashboard counts retrieved successfully", counts));
});

export const getDashboardTimeseries = asyncHandler(async (req, res) => {
  const series = await dashboardService.timeseries(req.query);
  res.status(status.OK).json(new ApiResponse(status.OK, "Dashboard timeseries retrieved successfully", series));
});
