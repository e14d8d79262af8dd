import { Request, Response } from "express";
import { createLogger } from "../../lib/logger/index.js";
import { isAdmin } from "../../lib/auth/index.js";
import { handleException, sendError } from "../../lib/http/index.js";
import type { DataContext } from "../../domain/data-context.js";
import {
  getArticle,
  recordArticleView,
  type ArticleLookup,
} from "../../domain/article/get-article.js";

const logger = createLogger("printhub:handlers:articles:get");

async function sendArticle(
  ctx: DataContext,
  req: Request,
  res: Response,
  lookup: ArticleLookup,
): Promise<void> {
  const result = await getArticle(ctx, lookup);

  if (!result.success) {
    sendError(res, result.error);
    return;
  }

  const article = result.data;
  if (!article || (!article.isPublished && !isAdmin(req))) {
    res.status(404).json({ error: "Article not found" });
    return;
  }

  if (!article.isPublished) {
    res.json(article);
    return;
  }

  const viewed = await recordArticleView(ctx, article);
  if (!viewed.success) {
    sendError(res, viewed.error);
    return;
  }
  res.json(viewed.data);
}

/**
 * GET /api/v1/articles/:id
 */
export function getArticleHandler(ctx: DataContext) {
  return async (req: Request<{ id: string }>, res: Response): Promise<void> => {
    try {
      await sendArticle(ctx, req, res, { id: req.params.id });
    } catch (error) {
      handleException(res, error, logger, "Failed to get article", {
        id: req.params.id,
      });
    }
  };
}

/**
 * GET /api/v1/articles/slug/:slug
 */
export function getArticleBySlugHandler(ctx: DataContext) {
  return async (
    req: Request<{ slug: string }>,
    res: Response,
  ): Promise<void> => {
    try {
      await sendArticle(ctx, req, res, { slug: req.params.slug });
    } catch (error) {
      handleException(res, error, logger, "Failed to get article by slug", {
        slug: req.params.slug,
      });
    }
  };
}
