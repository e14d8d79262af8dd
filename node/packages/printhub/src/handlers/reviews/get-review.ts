import { Request, Response } from "express";
import { createLogger } from "../../lib/logger/index.js";
import { handleException, sendError } from "../../lib/http/index.js";
import type { DataContext } from "../../domain/data-context.js";
import { getReview } from "../../domain/review/list-reviews.js";

const logger = createLogger("printhub:handlers:reviews:get");

/**
 * GET /api/v1/reviews/:id (approved only) and
 * GET /api/v1/reviews/admin/:id (any review)
 */
export function getReviewHandler(ctx: DataContext, approvedOnly: boolean) {
  return async (req: Request<{ id: string }>, res: Response): Promise<void> => {
    try {
      const result = await getReview(ctx, req.params.id);

      if (!result.success) {
        sendError(res, result.error);
        return;
      }

      if (!result.data || (approvedOnly && !result.data.isApproved)) {
        res.status(404).json({ error: "Review not found" });
        return;
      }

      res.json(result.data);
    } catch (error) {
      handleException(res, error, logger, "Failed to get review", {
        id: req.params.id,
      });
    }
  };
}
