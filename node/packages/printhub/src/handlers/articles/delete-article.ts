import { Request, Response } from "express";
import { createLogger } from "../../lib/logger/index.js";
import { handleException, sendError } from "../../lib/http/index.js";
import type { DataContext } from "../../domain/data-context.js";
import { deleteArticle } from "../../domain/article/delete-article.js";

const logger = createLogger("printhub:handlers:articles:delete");

/**
 * DELETE /api/v1/articles/:id (admin)
 */
export function deleteArticleHandler(ctx: DataContext) {
  return async (req: Request<{ id: string }>, res: Response): Promise<void> => {
    try {
      const result = await deleteArticle(ctx, req.params.id);

      if (!result.success) {
        sendError(res, result.error);
        return;
      }

      res.status(204).end();
    } catch (error) {
      handleException(res, error, logger, "Error deleting article", {
        id: req.params.id,
      });
    }
  };
}
