import status from "http-status";
import { getApiErrorClass, getApiResponseClass } from "@/interface";
import { asyncHandler, getCookieName, sessionCookieOptions, sessionMaxAge } from "@/utils";
import { adminService } from "@/container";

const ApiError = getApiErrorClass("ADMIN");
const ApiResponse = getApiResponseClass("ADMIN");

export const loginAdmin = asyncHandler(async (req, res) => {
  const { admin, token } = await adminService.login(req.body);
  res
    .cookie(getCookieName("admin"), token, { ...sessionCookieOptions(), maxAge: sessionMaxAge() })
    .status(status.OK)
    .json(new ApiResponse(status.OK, "Admin logged in successfully", { admin, accessToken: token }));
});

export const logoutAdmin = asyncHandler(async (req, res) => {
  res
    .clearCookie(getCookieName("admin"), sessionCookieOptions())
    .status(status.OK)
    .json(new ApiResponse(status.OK, "Logged out successfully"));
});

export const getCurrentAdmin = asyncHandler(async (req, res) => {
  if (!req.user) {
    throw new ApiError(status.FORBIDDEN, "Authentication required");
  }
  const admin = await adminService.me(req.user.id);
  res.status(status.OK).json(new ApiResponse(status.OK, "Admin retrieved successfully", admin));
});

export const registerAdmin = asyncHandler(async (req, res) => {
  const admin = await adminService.register(req.body);
  res.status(status.CREATED).json(new ApiResponse(status.CREATED, "Admin registered successfully", admin));
});

export const forgotAdminPassword = asyncHandler(async (req, res) => {
  await adminService.forgotPassword(req.body);
  res.status(status.OK).json(new ApiResponse(status.OK, "If this account exists, a reset link has been sent."));
});

export const resetAdminPassword = asyncHandler(async (req, res) => {
  await adminService.resetPassword(req.body);
  res.status(status.OK).json(new ApiResponse(status.OK, "Password updated. Please log in."));
});
