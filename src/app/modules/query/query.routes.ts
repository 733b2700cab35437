import express from "express";
import { auth, authenticatedActionLimiter, optionalAuth, submissionLimiter } from "@/middlewares";
import {
  deleteQuery,
  getAllQueries,
  getMyQueries,
  getQueryById,
  promoteQueryToFaq,
  submitQuery,
  trackQueries,
  updateQuery,
} from "./query.controller";

const router = express.Router();

router.post("/", optionalAuth("student"), submissionLimiter, submitQuery);
router.get("/mine", auth("student"), authenticatedActionLimiter, getMyQueries);
router.post("/track", submissionLimiter, trackQueries);

router.get("/", auth("admin"), authenticatedActionLimiter, getAllQueries);
router.get("/:id", auth("admin"), authenticatedActionLimiter, getQueryById);
router.patch("/:id", auth("admin"), authenticatedActionLimiter, updateQuery);
router.delete("/:id", auth("admin"), authenticatedActionLimiter, deleteQuery);
router.post("/:id/faq", auth("admin"), authenticatedActionLimiter, promoteQueryToFaq);

export const queryRouter = router;
