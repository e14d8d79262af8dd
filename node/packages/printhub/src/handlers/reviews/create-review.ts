import { Request, Response } from "express";
import { z } from "zod";
import { createLogger } from "../../lib/logger/index.js";
import {
  handleException,
  sendError,
  uploadedFiles,
} from "../../lib/http/index.js";
import type { DataContext } from "../../domain/data-context.js";
import { createReview } from "../../domain/review/create-review.js";

const logger = createLogger("printhub:handlers:reviews:create");

export const reviewImageSchema = z.object({
  url: z.string().min(1),
  caption: z.string().optional(),
});

// Multipart forms send every field as a string, hence the coercion
export const createReviewSchema = z.object({
  customerName: z.string().min(1).max(100),
  customerEmail: z.string().email().max(200),
  rating: z.coerce.number().int().min(1).max(5),
  title: z.string().max(200).optional(),
  content: z.string().min(1),
  images: z.array(reviewImageSchema).optional(),
});

/**
 * POST /api/v1/reviews - JSON, or multipart with photos in `images`
 */
export function createReviewHandler(ctx: DataContext) {
  return async (req: Request, res: Response): Promise<void> => {
    try {
      const input = createReviewSchema.parse(req.body);
      const result = await createReview(ctx, input, uploadedFiles(req));

      if (!result.success) {
        sendError(res, result.error);
        return;
      }

      res.status(201).json(result.data);
    } catch (error) {
      handleException(res, error, logger, "Failed to create review");
    }
  };
}
