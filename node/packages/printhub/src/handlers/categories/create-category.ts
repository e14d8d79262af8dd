import { Request, Response } from "express";
import { z } from "zod";
import { createLogger } from "../../lib/logger/index.js";
import { handleException, sendError } from "../../lib/http/index.js";
import type { DataContext } from "../../domain/data-context.js";
import { createCategory } from "../../domain/category/create-category.js";
import { categoryTypeSchema } from "./list-categories.js";

const logger = createLogger("printhub:handlers:categories:create");

export const slugSchema = z
  .string()
  .min(1)
  .max(100)
  .regex(/^[a-z0-9]+(?:-[a-z0-9]+)*$/, "Slug must be lowercase words separated by dashes");

export const createCategorySchema = z.object({
  name: z.string().min(1).max(100),
  slug: slugSchema.optional(),
  description: z.string().optional(),
  isActive: z.boolean().optional(),
  type: categoryTypeSchema,
});

/**
 * POST /api/v1/categories (admin)
 */
export function createCategoryHandler(ctx: DataContext) {
  return async (req: Request, res: Response): Promise<void> => {
    try {
      const input = createCategorySchema.parse(req.body);
      const result = await createCategory(ctx, input);

      if (!result.success) {
        sendError(res, result.error);
        return;
      }

      res.status(201).json(result.data);
    } catch (error) {
      handleException(res, error, logger, "Failed to create category");
    }
  };
}
