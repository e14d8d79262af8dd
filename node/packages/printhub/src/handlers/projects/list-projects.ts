import { Request, Response } from "express";
import { z } from "zod";
import { createLogger } from "../../lib/logger/index.js";
import {
  handleException,
  queryBoolean,
  queryList,
  sendError,
} from "../../lib/http/index.js";
import type { DataContext } from "../../domain/data-context.js";
import {
  listFeaturedProjects,
  listProjectCategories,
  listProjects,
} from "../../domain/project/list-projects.js";

const logger = createLogger("printhub:handlers:projects:list");

export const COMPLEXITY_LEVELS = ["simple", "medium", "complex"] as const;
export const complexityLevelSchema = z.enum(COMPLEXITY_LEVELS);

const listProjectsQuery = z.object({
  page: z.coerce.number().int().min(1).default(1),
  perPage: z.coerce.number().int().min(1).max(100).default(12),
  category: z.string().min(1).optional(),
  isFeatured: queryBoolean.optional(),
  search: z.string().min(1).optional(),
  complexityLevels: queryList.pipe(z.array(complexityLevelSchema)).optional(),
  minPrice: z.coerce.number().min(0).optional(),
  maxPrice: z.coerce.number().min(0).optional(),
  minHours: z.coerce.number().int().min(0).optional(),
  maxHours: z.coerce.number().int().min(0).optional(),
});

const featuredQuery = z.object({
  limit: z.coerce.number().int().min(1).max(50).default(10),
});

/**
 * GET /api/v1/projects - Paged, filtered portfolio
 */
export function listProjectsHandler(ctx: DataContext) {
  return async (req: Request, res: Response): Promise<void> => {
    try {
      const params = listProjectsQuery.parse(req.query);
      const result = await listProjects(ctx, params);

      if (!result.success) {
        sendError(res, result.error);
        return;
      }

      res.json(result.data);
    } catch (error) {
      handleException(res, error, logger, "Error listing projects");
    }
  };
}

/**
 * GET /api/v1/projects/featured
 */
export function listFeaturedProjectsHandler(ctx: DataContext) {
  return async (req: Request, res: Response): Promise<void> => {
    try {
      const { limit } = featuredQuery.parse(req.query);
      const result = await listFeaturedProjects(ctx, limit);

      if (!result.success) {
        sendError(res, result.error);
        return;
      }

      res.json(result.data);
    } catch (error) {
      handleException(res, error, logger, "Error listing featured projects");
    }
  };
}

/**
 * GET /api/v1/projects/categories
 */
export function listProjectCategoriesHandler(ctx: DataContext) {
  return async (_req: Request, res: Response): Promise<void> => {
    try {
      const result = await listProjectCategories(ctx);

      if (!result.success) {
        sendError(res, result.error);
        return;
      }

      res.json(result.data);
    } catch (error) {
      handleException(res, error, logger, "Error listing project categories");
    }
  };
}

/**
 * GET /api/v1/projects/complexity-levels
 */
export function listComplexityLevelsHandler() {
  return (_req: Request, res: Response): void => {
    res.json(COMPLEXITY_LEVELS);
  };
}
