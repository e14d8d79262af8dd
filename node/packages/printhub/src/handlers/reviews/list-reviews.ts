import { Request, Response } from "express";
import { z } from "zod";
import { createLogger } from "../../lib/logger/index.js";
import {
  handleException,
  paginationQuery,
  queryBoolean,
  sendError,
} from "../../lib/http/index.js";
import type { DataContext } from "../../domain/data-context.js";
import {
  listReviews,
  type ListReviewsParams,
} from "../../domain/review/list-reviews.js";
import { getReviewStats } from "../../domain/review/review-stats.js";

const logger = createLogger("printhub:handlers:reviews:list");

const adminListQuery = paginationQuery.extend({
  approved: queryBoolean.optional(),
});

const searchQuery = paginationQuery.extend({
  q: z.string().min(1),
});

const featuredQuery = z.object({
  limit: z.coerce.number().int().min(1).max(50).default(6),
});

async function sendList(
  ctx: DataContext,
  res: Response,
  params: ListReviewsParams,
): Promise<void> {
  const result = await listReviews(ctx, params);
  if (!result.success) {
    sendError(res, result.error);
    return;
  }
  res.json(result.data);
}

/**
 * GET /api/v1/reviews - Approved reviews
 */
export function listApprovedReviewsHandler(ctx: DataContext) {
  return async (req: Request, res: Response): Promise<void> => {
    try {
      const params = paginationQuery.parse(req.query);
      await sendList(ctx, res, { ...params, approved: true });
    } catch (error) {
      handleException(res, error, logger, "Error listing reviews");
    }
  };
}

/**
 * GET /api/v1/reviews/featured
 */
export function listFeaturedReviewsHandler(ctx: DataContext) {
  return async (req: Request, res: Response): Promise<void> => {
    try {
      const { limit } = featuredQuery.parse(req.query);
      const result = await listReviews(ctx, {
        approved: true,
        featured: true,
        limit,
      });

      if (!result.success) {
        sendError(res, result.error);
        return;
      }

      res.json(result.data.data);
    } catch (error) {
      handleException(res, error, logger, "Error listing featured reviews");
    }
  };
}

/**
 * GET /api/v1/reviews/stats
 */
export function reviewStatsHandler(ctx: DataContext) {
  return async (_req: Request, res: Response): Promise<void> => {
    try {
      const result = await getReviewStats(ctx);

      if (!result.success) {
        sendError(res, result.error);
        return;
      }

      res.json(result.data);
    } catch (error) {
      handleException(res, error, logger, "Error computing review stats");
    }
  };
}

/**
 * GET /api/v1/reviews/admin/all (admin)
 */
export function listAllReviewsHandler(ctx: DataContext) {
  return async (req: Request, res: Response): Promise<void> => {
    try {
      const params = adminListQuery.parse(req.query);
      await sendList(ctx, res, params);
    } catch (error) {
      handleException(res, error, logger, "Error listing all reviews");
    }
  };
}

/**
 * GET /api/v1/reviews/admin/pending (admin)
 */
export function listPendingReviewsHandler(ctx: DataContext) {
  return async (req: Request, res: Response): Promise<void> => {
    try {
      const params = paginationQuery.parse(req.query);
      await sendList(ctx, res, { ...params, approved: false });
    } catch (error) {
      handleException(res, error, logger, "Error listing pending reviews");
    }
  };
}

/**
 * GET /api/v1/reviews/admin/search?q= (admin)
 */
export function searchReviewsHandler(ctx: DataContext) {
  return async (req: Request, res: Response): Promise<void> => {
    try {
      const { q, ...params } = searchQuery.parse(req.query);
      await sendList(ctx, res, { ...params, search: q });
    } catch (error) {
      handleException(res, error, logger, "Error searching reviews");
    }
  };
}
