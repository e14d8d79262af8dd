import { Request, Response } from "express";
import { z } from "zod";
import { createLogger } from "../../lib/logger/index.js";
import { handleException, sendError } from "../../lib/http/index.js";
import type { DataContext } from "../../domain/data-context.js";
import { createArticle } from "../../domain/article/create-article.js";
import { slugSchema } from "../categories/create-category.js";
import { articleStatusSchema } from "./list-articles.js";

const logger = createLogger("printhub:handlers:articles:create");

export const createArticleSchema = z.object({
  title: z.string().min(1).max(200),
  slug: slugSchema.optional(),
  content: z.string().min(1),
  excerpt: z.string().optional(),
  featuredImage: z.string().max(255).optional(),
  category: z.string().min(1).max(50),
  tags: z.array(z.string()).optional(),
  status: articleStatusSchema.optional(),
});

/**
 * POST /api/v1/articles (admin)
 */
export function createArticleHandler(ctx: DataContext) {
  return async (req: Request, res: Response): Promise<void> => {
    try {
      const input = createArticleSchema.parse(req.body);
      const result = await createArticle(ctx, input);

      if (!result.success) {
        sendError(res, result.error);
        return;
      }

      res.status(201).json(result.data);
    } catch (error) {
      handleException(res, error, logger, "Failed to create article");
    }
  };
}
