import { Router } from "express";
import type { DataContext } from "../domain/data-context.js";
import { requireAdmin } from "../lib/auth/index.js";
import { createUpload } from "../lib/http/index.js";
import { createReviewHandler } from "../handlers/reviews/create-review.js";
import {
  listAllReviewsHandler,
  listApprovedReviewsHandler,
  listFeaturedReviewsHandler,
  listPendingReviewsHandler,
  reviewStatsHandler,
  searchReviewsHandler,
} from "../handlers/reviews/list-reviews.js";
import { getReviewHandler } from "../handlers/reviews/get-review.js";
import {
  approveReviewHandler,
  deleteReviewHandler,
  featureReviewHandler,
  moderateReviewHandler,
  rejectReviewHandler,
  updateReviewHandler,
} from "../handlers/reviews/moderate-review.js";

export function createReviewsRouter(ctx: DataContext): Router {
  const router = Router();
  const upload = createUpload(ctx.config);

  const admin = Router();
  admin.use(requireAdmin(ctx));
  admin.get("/all", listAllReviewsHandler(ctx));
  admin.get("/pending", listPendingReviewsHandler(ctx));
  admin.get("/search", searchReviewsHandler(ctx));
  admin.get("/:id", getReviewHandler(ctx, false));
  admin.put("/:id", updateReviewHandler(ctx));
  admin.put("/:id/moderate", moderateReviewHandler(ctx));
  admin.put("/:id/approve", approveReviewHandler(ctx));
  admin.put("/:id/reject", rejectReviewHandler(ctx));
  admin.put("/:id/feature", featureReviewHandler(ctx));
  admin.delete("/:id", deleteReviewHandler(ctx));
  router.use("/admin", admin);

  router.post("/", upload.array("images", 5), createReviewHandler(ctx));
  router.get("/", listApprovedReviewsHandler(ctx));
  router.get("/stats", reviewStatsHandler(ctx));
  router.get("/featured", listFeaturedReviewsHandler(ctx));
  router.get("/:id", getReviewHandler(ctx, true));

  return router;
}
