import express from "express";
import { auth, authLimiter, authenticatedActionLimiter } from "@/middlewares";
import {
  forgotStudentPassword,
  loginStudent,
  logoutStudent,
  resetStudentPassword,
  signupStudent,
  toggleStudentBlock,
} from "./student.controller";

const router = express.Router();

router.post("/signup", authLimiter, signupStudent);
router.post("/login", authLimiter, loginStudent);
router.post("/logout", logoutStudent);
router.post("/forgot-password", authLimiter, forgotStudentPassword);
router.post("/reset-password", authLimiter, resetStudentPassword);

router.patch("/:id/block", auth("admin"), authenticatedActionLimiter, toggleStudentBlock);

export const studentRouter = router;
