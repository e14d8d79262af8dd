import { Result, success, failure, toError } from "../../lib/core/index.js";
import { createLogger } from "../../lib/logger/index.js";
import type { ReviewDbRow } from "../../lib/db/index.js";
import type { DataContext } from "../data-context.js";
import type { ReviewStats } from "../../types.js";

const logger = createLogger("printhub:domain:review");

const RATINGS = ["1", "2", "3", "4", "5"] as const;

/**
 * Rating summary over approved reviews
 */
export async function getReviewStats(
  ctx: DataContext,
): Promise<Result<ReviewStats, Error>> {
  try {
    const rows = await ctx
      .db<ReviewDbRow>("review")
      .where("is_approved", true)
      .select("rating");

    const ratingDistribution: ReviewStats["ratingDistribution"] = {
      "1": 0,
      "2": 0,
      "3": 0,
      "4": 0,
      "5": 0,
    };
    let totalReviews = 0;
    let ratingSum = 0;

    for (const row of rows) {
      totalReviews += 1;
      ratingSum += Number(row.rating);
      const key = RATINGS.find((rating) => rating === String(row.rating));
      if (key) ratingDistribution[key] += 1;
    }

    const averageRating =
      totalReviews > 0 ? Math.round((ratingSum / totalReviews) * 10) / 10 : 0;

    return success({ averageRating, totalReviews, ratingDistribution });
  } catch (error) {
    logger.error("Failed to compute review stats", { error });
    return failure(toError(error));
  }
}
