import { Request, Response } from "express";
import { z } from "zod";
import { createLogger } from "../../lib/logger/index.js";
import { handleException, sendError } from "../../lib/http/index.js";
import type { DataContext } from "../../domain/data-context.js";
import { updateReview } from "../../domain/review/update-review.js";
import { deleteReview } from "../../domain/review/delete-review.js";
import type { UpdateReviewInput } from "../../types.js";
import { reviewImageSchema } from "./create-review.js";

const logger = createLogger("printhub:handlers:reviews:moderate");

export const moderateReviewSchema = z.object({
  isApproved: z.boolean().optional(),
  isFeatured: z.boolean().optional(),
});

export const featureReviewSchema = z.object({
  featured: z.boolean(),
});

export const updateReviewSchema = z.object({
  rating: z.number().int().min(1).max(5).optional(),
  title: z.string().max(200).nullable().optional(),
  content: z.string().min(1).optional(),
  images: z.array(reviewImageSchema).optional(),
  isApproved: z.boolean().optional(),
  isFeatured: z.boolean().optional(),
});

/**
 * Shared body of the admin review update routes: `toInput` turns the
 * request body into the changes to apply.
 */
function reviewUpdateHandler(
  ctx: DataContext,
  toInput: (body: unknown) => UpdateReviewInput,
) {
  return async (req: Request<{ id: string }>, res: Response): Promise<void> => {
    try {
      const input = toInput(req.body);
      const result = await updateReview(ctx, req.params.id, input);

      if (!result.success) {
        sendError(res, result.error);
        return;
      }

      res.json(result.data);
    } catch (error) {
      handleException(res, error, logger, "Error updating review", {
        id: req.params.id,
      });
    }
  };
}

/**
 * PUT /api/v1/reviews/admin/:id
 */
export function updateReviewHandler(ctx: DataContext) {
  return reviewUpdateHandler(ctx, (body) => updateReviewSchema.parse(body));
}

/**
 * PUT /api/v1/reviews/admin/:id/moderate
 */
export function moderateReviewHandler(ctx: DataContext) {
  return reviewUpdateHandler(ctx, (body) => moderateReviewSchema.parse(body));
}

/**
 * PUT /api/v1/reviews/admin/:id/approve
 */
export function approveReviewHandler(ctx: DataContext) {
  return reviewUpdateHandler(ctx, () => ({ isApproved: true }));
}

/**
 * PUT /api/v1/reviews/admin/:id/reject - Unapproves and unfeatures
 */
export function rejectReviewHandler(ctx: DataContext) {
  return reviewUpdateHandler(ctx, () => ({
    isApproved: false,
    isFeatured: false,
  }));
}

/**
 * PUT /api/v1/reviews/admin/:id/feature
 */
export function featureReviewHandler(ctx: DataContext) {
  return reviewUpdateHandler(ctx, (body) => ({
    isFeatured: featureReviewSchema.parse(body).featured,
  }));
}

/**
 * DELETE /api/v1/reviews/admin/:id
 */
export function deleteReviewHandler(ctx: DataContext) {
  return async (req: Request<{ id: string }>, res: Response): Promise<void> => {
    try {
      const result = await deleteReview(ctx, req.params.id);

      if (!result.success) {
        sendError(res, result.error);
        return;
      }

      res.status(204).end();
    } catch (error) {
      handleException(res, error, logger, "Error deleting review", {
        id: req.params.id,
      });
    }
  };
}
