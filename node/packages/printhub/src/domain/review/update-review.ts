import {
  Result,
  success,
  failure,
  NotFoundError,
  toError,
} from "../../lib/core/index.js";
import { createLogger } from "../../lib/logger/index.js";
import { toJson, type ReviewDbRow } from "../../lib/db/index.js";
import type { DataContext } from "../data-context.js";
import type { Review, UpdateReviewInput } from "../../types.js";
import { mapReviewFromDb } from "../../mappers.js";

const logger = createLogger("printhub:domain:review");

/**
 * Edit or moderate a review
 */
export async function updateReview(
  ctx: DataContext,
  id: string,
  input: UpdateReviewInput,
): Promise<Result<Review, Error>> {
  try {
    const existing = await ctx
      .db<ReviewDbRow>("review")
      .where("id", id)
      .first();
    if (!existing) {
      return failure(new NotFoundError("Review", id));
    }

    const changes: Partial<ReviewDbRow> = { updated_at: Date.now() };
    if (input.rating !== undefined) changes.rating = input.rating;
    if (input.title !== undefined) changes.title = input.title;
    if (input.content !== undefined) changes.content = input.content;
    if (input.images !== undefined) changes.images = toJson(input.images);
    if (input.isApproved !== undefined) changes.is_approved = input.isApproved;
    if (input.isFeatured !== undefined) changes.is_featured = input.isFeatured;

    await ctx.db("review").where("id", id).update(changes);

    logger.info("Updated review", {
      id,
      isApproved: input.isApproved,
      isFeatured: input.isFeatured,
    });
    return success(mapReviewFromDb({ ...existing, ...changes }));
  } catch (error) {
    logger.error("Failed to update review", { error, id });
    return failure(toError(error));
  }
}
