import { Request, Response } from "express";
import { z } from "zod";
import { createLogger } from "../../lib/logger/index.js";
import { handleException, sendError } from "../../lib/http/index.js";
import type { DataContext } from "../../domain/data-context.js";
import { updateArticle } from "../../domain/article/update-article.js";
import { slugSchema } from "../categories/create-category.js";
import { articleStatusSchema } from "./list-articles.js";

const logger = createLogger("printhub:handlers:articles:update");

export const updateArticleSchema = z.object({
  title: z.string().min(1).max(200).optional(),
  slug: slugSchema.optional(),
  content: z.string().min(1).optional(),
  excerpt: z.string().nullable().optional(),
  featuredImage: z.string().max(255).nullable().optional(),
  category: z.string().min(1).max(50).optional(),
  tags: z.array(z.string()).optional(),
  status: articleStatusSchema.optional(),
});

/**
 * PUT /api/v1/articles/:id (admin)
 */
export function updateArticleHandler(ctx: DataContext) {
  return async (req: Request<{ id: string }>, res: Response): Promise<void> => {
    try {
      const input = updateArticleSchema.parse(req.body);
      const result = await updateArticle(ctx, req.params.id, input);

      if (!result.success) {
        sendError(res, result.error);
        return;
      }

      res.json(result.data);
    } catch (error) {
      handleException(res, error, logger, "Error updating article", {
        id: req.params.id,
      });
    }
  };
}
