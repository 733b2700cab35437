import express from "express";
import { auth, authLimiter, authenticatedActionLimiter } from "@/middlewares";
import {
  forgotAdminPassword,
  getCurrentAdmin,
  loginAdmin,
  logoutAdmin,
  registerAdmin,
  resetAdminPassword,
} from "./admin.controller";

const router = express.Router();

router.post("/login", authLimiter, loginAdmin);
router.post("/logout", logoutAdmin);
router.post("/forgot-password", authLimiter, forgotAdminPassword);
router.post("/reset-password", authLimiter, resetAdminPassword);
router.get("/me", auth("admin"), authenticatedActionLimiter, getCurrentAdmin);
router.post("/", auth("admin"), authenticatedActionLimiter, registerAdmin);

export const adminRouter = router;
