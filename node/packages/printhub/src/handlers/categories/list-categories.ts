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
import { listCategories } from "../../domain/category/list-categories.js";

const logger = createLogger("printhub:handlers:categories:list");

export const categoryTypeSchema = z.enum(["article", "project", "service"]);

const listCategoriesQuery = paginationQuery.extend({
  type: categoryTypeSchema.optional(),
  activeOnly: queryBoolean.default("true"),
});

const searchCategoriesQuery = paginationQuery.extend({
  q: z.string().min(1),
  type: categoryTypeSchema.optional(),
});

/**
 * GET /api/v1/categories
 */
export function listCategoriesHandler(ctx: DataContext) {
  return async (req: Request, res: Response): Promise<void> => {
    try {
      const params = listCategoriesQuery.parse(req.query);
      const result = await listCategories(ctx, params);

      if (!result.success) {
        sendError(res, result.error);
        return;
      }

      res.json(result.data);
    } catch (error) {
      handleException(res, error, logger, "Error listing categories");
    }
  };
}

/**
 * GET /api/v1/categories/search?q=
 */
export function searchCategoriesHandler(ctx: DataContext) {
  return async (req: Request, res: Response): Promise<void> => {
    try {
      const { q, ...params } = searchCategoriesQuery.parse(req.query);
      const result = await listCategories(ctx, {
        ...params,
        search: q,
        activeOnly: true,
      });

      if (!result.success) {
        sendError(res, result.error);
        return;
      }

      res.json(result.data);
    } catch (error) {
      handleException(res, error, logger, "Error searching categories");
    }
  };
}
