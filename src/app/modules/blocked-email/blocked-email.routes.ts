import express from "express";
import { auth, authenticatedActionLimiter } from "@/middlewares";
import { getBlockedEmails, toggleBlockedEmail } from "./blocked-email.controller";

const router = express.Router();

router.use(auth("admin"));

router.get("/", authenticatedActionLimiter, getBlockedEmails);
router.post("/toggle", authenticatedActionLimiter, toggleBlockedEmail);

export const blockedEmailRouter = router;
