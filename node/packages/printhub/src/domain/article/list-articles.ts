import { Result, success, failure, toError } from "../../lib/core/index.js";
import { createLogger } from "../../lib/logger/index.js";
import { countRows, type ArticleDbRow } from "../../lib/db/index.js";
import type { DataContext } from "../data-context.js";
import type {
  Article,
  ArticleStatus,
  PaginatedResult,
} from "../../types.js";
import { mapArticleFromDb } from "../../mappers.js";

const logger = createLogger("printhub:domain:article");

export type ListArticlesParams = {
  status?: ArticleStatus;
  category?: string;
  publishedOnly?: boolean;
  limit?: number;
  offset?: number;
};

export async function listArticles(
  ctx: DataContext,
  params: ListArticlesParams = {},
): Promise<Result<PaginatedResult<Article>, Error>> {
  try {
    const limit = params.limit ?? 100;
    const offset = params.offset ?? 0;

    const query = ctx.db<ArticleDbRow>("article");
    if (params.publishedOnly) query.where("is_published", true);
    if (params.status) query.where("status", params.status);
    if (params.category) query.where("category", params.category);

    const total = await countRows(query);
    const rows: ArticleDbRow[] = await query
      .clone()
      // Published first, newest first; drafts after, newest first
      .orderByRaw("published_at is null")
      .orderBy("published_at", "desc")
      .orderBy("created_at", "desc")
      .limit(limit)
      .offset(offset);

    return success({
      data: rows.map(mapArticleFromDb),
      pagination: { total, limit, offset },
    });
  } catch (error) {
    logger.error("Failed to list articles", { error });
    return failure(toError(error));
  }
}
