import express from "express";
import { auth, authenticatedActionLimiter } from "@/middlewares";
import { createFaq, getAllFaqs, getFaqById, getPublicFaqs, toggleFaqActive, updateFaqAnswer } from "./faq.controller";

const router = express.Router();

router.get("/", getPublicFaqs);

router.get("/admin", auth("admin"), authenticatedActionLimiter, getAllFaqs);
router.get("/:id", auth("admin"), authenticatedActionLimiter, getFaqById);
router.post("/", auth("admin"), authenticatedActionLimiter, createFaq);
router.patch("/:id", auth("admin"), authenticatedActionLimiter, updateFaqAnswer);
router.patch("/:id/toggle", auth("admin"), authenticatedActionLimiter, toggleFaqActive);

export const faqRouter = router;
