import { Result, success, failure, toError } from "../../lib/core/index.js";
import { createLogger } from "../../lib/logger/index.js";
import {
  countRows,
  whereContains,
  type ReviewDbRow,
} from "../../lib/db/index.js";
import type { DataContext } from "../data-context.js";
import type { PaginatedResult, Review } from "../../types.js";
import { mapReviewFromDb } from "../../mappers.js";

const logger = createLogger("printhub:domain:review");

export type ListReviewsParams = {
  approved?: boolean;
  featured?: boolean;
  search?: string;
  limit?: number;
  offset?: number;
};

export async function listReviews(
  ctx: DataContext,
  params: ListReviewsParams = {},
): Promise<Result<PaginatedResult<Review>, Error>> {
  try {
    const limit = params.limit ?? 100;
    const offset = params.offset ?? 0;

    const query = ctx.db<ReviewDbRow>("review");
    if (params.approved !== undefined) {
      query.where("is_approved", params.approved);
    }
    if (params.featured !== undefined) {
      query.where("is_featured", params.featured);
    }
    if (params.search) {
      whereContains(
        query,
        ["customer_name", "customer_email", "title", "content"],
        params.search,
      );
    }

    const total = await countRows(query);
    const rows: ReviewDbRow[] = await query
      .clone()
      .orderBy("created_at", "desc")
      .limit(limit)
      .offset(offset);

    return success({
      data: rows.map(mapReviewFromDb),
      pagination: { total, limit, offset },
    });
  } catch (error) {
    logger.error("Failed to list reviews", { error });
    return failure(toError(error));
  }
}

export async function getReview(
  ctx: DataContext,
  id: string,
): Promise<Result<Review | null, Error>> {
  try {
    const row = await ctx.db<ReviewDbRow>("review").where("id", id).first();
    return success(row ? mapReviewFromDb(row) : null);
  } catch (error) {
    logger.error("Failed to get review", { error, id });
    return failure(toError(error));
  }
}
