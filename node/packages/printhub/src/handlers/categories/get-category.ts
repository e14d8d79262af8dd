import { Request, Response } from "express";
import { createLogger } from "../../lib/logger/index.js";
import { handleException, sendError } from "../../lib/http/index.js";
import type { DataContext } from "../../domain/data-context.js";
import {
  getCategory,
  getCategoryBySlug,
} from "../../domain/category/get-category.js";

const logger = createLogger("printhub:handlers:categories:get");

/**
 * GET /api/v1/categories/:id
 */
export function getCategoryHandler(ctx: DataContext) {
  return async (req: Request<{ id: string }>, res: Response): Promise<void> => {
    try {
      const result = await getCategory(ctx, req.params.id);

      if (!result.success) {
        sendError(res, result.error);
        return;
      }

      if (!result.data) {
        res.status(404).json({ error: "Category not found" });
        return;
      }

      res.json(result.data);
    } catch (error) {
      handleException(res, error, logger, "Failed to get category", {
        id: req.params.id,
      });
    }
  };
}

/**
 * GET /api/v1/categories/slug/:slug
 */
export function getCategoryBySlugHandler(ctx: DataContext) {
  return async (
    req: Request<{ slug: string }>,
    res: Response,
  ): Promise<void> => {
    try {
      const result = await getCategoryBySlug(ctx, req.params.slug);

      if (!result.success) {
        sendError(res, result.error);
        return;
      }

      if (!result.data) {
        res.status(404).json({ error: "Category not found" });
        return;
      }

      res.json(result.data);
    } catch (error) {
      handleException(res, error, logger, "Failed to get category by slug", {
        slug: req.params.slug,
      });
    }
  };
}
