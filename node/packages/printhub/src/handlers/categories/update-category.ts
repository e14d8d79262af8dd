import { Request, Response } from "express";
import { z } from "zod";
import { createLogger } from "../../lib/logger/index.js";
import { handleException, sendError } from "../../lib/http/index.js";
import type { DataContext } from "../../domain/data-context.js";
import {
  setCategoryActive,
  updateCategory,
} from "../../domain/category/update-category.js";
import { categoryTypeSchema } from "./list-categories.js";
import { slugSchema } from "./create-category.js";

const logger = createLogger("printhub:handlers:categories:update");

export const updateCategorySchema = z.object({
  name: z.string().min(1).max(100).optional(),
  slug: slugSchema.optional(),
  description: z.string().nullable().optional(),
  isActive: z.boolean().optional(),
  type: categoryTypeSchema.optional(),
});

/**
 * PUT /api/v1/categories/:id (admin)
 */
export function updateCategoryHandler(ctx: DataContext) {
  return async (req: Request<{ id: string }>, res: Response): Promise<void> => {
    try {
      const input = updateCategorySchema.parse(req.body);
      const result = await updateCategory(ctx, req.params.id, input);

      if (!result.success) {
        sendError(res, result.error);
        return;
      }

      res.json(result.data);
    } catch (error) {
      handleException(res, error, logger, "Error updating category", {
        id: req.params.id,
      });
    }
  };
}

/**
 * DELETE /api/v1/categories/:id deactivates; POST /:id/activate restores
 */
export function setCategoryActiveHandler(ctx: DataContext, isActive: boolean) {
  return async (req: Request<{ id: string }>, res: Response): Promise<void> => {
    try {
      const result = await setCategoryActive(ctx, req.params.id, isActive);

      if (!result.success) {
        sendError(res, result.error);
        return;
      }

      res.json(result.data);
    } catch (error) {
      handleException(res, error, logger, "Error changing category state", {
        id: req.params.id,
        isActive,
      });
    }
  };
}
