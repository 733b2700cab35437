import status from "http-status";
import { getApiResponseClass } from "@/interface";
import { asyncHandler, getCookieName, sessionCookieOptions, sessionMaxAge } from "@/utils";
import { studentService } from "@/container";

const ApiResponse = getApiResponseClass("STUDENT");

export const signupStudent = asyncHandler(async (req, res) => {
  const student = await studentService.signup(req.body);
  res.status(status.CREATED).json(new ApiResponse(status.CREATED, "Signup successful. Please log in.", student));
});

export const loginStudent = asyncHandler(async (req, res) => {
  const { student, token } = await studentService.login(req.body);
  res
    .cookie(getCookieName("student"), token, { ...sessionCookieOptions(), maxAge: sessionMaxAge() })
    .status(status.OK)
    .json(new ApiResponse(status.OK, "Logged in successfully", { student, accessToken: token }));
});

export const logoutStudent = asyncHandler(async (req, res) => {
  res
    .clearCookie(getCookieName("student"), sessionCookieOptions())
    .status(status.OK)
    .json(new ApiResponse(status.OK, "Logged out successfully"));
});

export const toggleStudentBlock = asyncHandler(async (req, res) => {
  const student = await studentService.toggleBlocked(req.params.id);
  res.status(status.OK).json(
    new ApiResponse(status.OK, `Student ${student.isBlocked ? "blocked" : "unblocked"} successfully`, student)
  );
});

export const forgotStudentPassword = asyncHandler(async (req, res) => {
  await studentService.forgotPassword(req.body);
  res.status(status.OK).json(new ApiResponse(status.OK, "If this account exists, a reset link has been sent."));
});

export const resetStudentPassword = asyncHandler(async (req, res) => {
  await studentService.resetPassword(req.body);
  res.status(status.OK).json(new ApiResponse(status.OK, "Password updated. Please log in."));
});
