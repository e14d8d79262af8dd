import { Result, success, failure, toError } from "../../lib/core/index.js";
import { createLogger } from "../../lib/logger/index.js";
import type { ArticleDbRow } from "../../lib/db/index.js";
import type { DataContext } from "../data-context.js";
import type { Article } from "../../types.js";
import { mapArticleFromDb } from "../../mappers.js";

const logger = createLogger("printhub:domain:article");

export type ArticleLookup = { id: string } | { slug: string };

export async function getArticle(
  ctx: DataContext,
  lookup: ArticleLookup,
): Promise<Result<Article | null, Error>> {
  try {
    const query = ctx.db<ArticleDbRow>("article");
    if ("id" in lookup) {
      query.where("id", lookup.id);
    } else {
      query.where("slug", lookup.slug);
    }
    const row = await query.first();
    return success(row ? mapArticleFromDb(row) : null);
  } catch (error) {
    logger.error("Failed to get article", { error, lookup });
    return failure(toError(error));
  }
}

/**
 * Count a read of a published article; returns the article as stored after
 * the increment.
 */
export async function recordArticleView(
  ctx: DataContext,
  article: Article,
): Promise<Result<Article, Error>> {
  try {
    await ctx.db("article").where("id", article.id).increment("views", 1);
    return success({ ...article, views: article.views + 1 });
  } catch (error) {
    logger.error("Failed to record article view", { error, id: article.id });
    return failure(toError(error));
  }
}
