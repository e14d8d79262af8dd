import { Request, Response } from "express";
import { z } from "zod";
import { createLogger } from "../../lib/logger/index.js";
import { isAdmin } from "../../lib/auth/index.js";
import {
  handleException,
  paginationQuery,
  sendError,
} from "../../lib/http/index.js";
import type { DataContext } from "../../domain/data-context.js";
import { listArticles } from "../../domain/article/list-articles.js";

const logger = createLogger("printhub:handlers:articles:list");

export const articleStatusSchema = z.enum(["draft", "published"]);

const listArticlesQuery = paginationQuery.extend({
  status: articleStatusSchema.optional(),
  category: z.string().min(1).optional(),
});

/**
 * GET /api/v1/articles - Published articles; admins see drafts too
 */
export function listArticlesHandler(ctx: DataContext) {
  return async (req: Request, res: Response): Promise<void> => {
    try {
      const { status, ...params } = listArticlesQuery.parse(req.query);
      const admin = isAdmin(req);
      const result = await listArticles(ctx, {
        ...params,
        status: admin ? status : undefined,
        publishedOnly: !admin,
      });

      if (!result.success) {
        sendError(res, result.error);
        return;
      }

      res.json(result.data);
    } catch (error) {
      handleException(res, error, logger, "Error listing articles");
    }
  };
}
