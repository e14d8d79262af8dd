import { v4 as uuidv4 } from "uuid";
import {
  Result,
  success,
  failure,
  ConflictError,
  slugify,
  toError,
} from "../../lib/core/index.js";
import { createLogger } from "../../lib/logger/index.js";
import { toJson, type ArticleDbRow } from "../../lib/db/index.js";
import type { DataContext } from "../data-context.js";
import type { Article, CreateArticleInput } from "../../types.js";
import { mapArticleFromDb } from "../../mappers.js";
import { isArticleSlugTaken } from "./find-slug-conflict.js";

const logger = createLogger("printhub:domain:article");

export async function createArticle(
  ctx: DataContext,
  input: CreateArticleInput,
): Promise<Result<Article, Error>> {
  try {
    const slug = input.slug ?? slugify(input.title);
    if (await isArticleSlugTaken(ctx, slug)) {
      return failure(
        new ConflictError(`Article with slug "${slug}" already exists`),
      );
    }

    const now = Date.now();
    const status = input.status ?? "draft";
    const row: ArticleDbRow = {
      id: uuidv4(),
      title: input.title,
      slug,
      content: input.content,
      excerpt: input.excerpt ?? null,
      featured_image: input.featuredImage ?? null,
      category: input.category,
      tags: toJson(input.tags ?? []),
      status,
      is_published: status === "published",
      published_at: status === "published" ? now : null,
      views: 0,
      created_at: now,
      updated_at: now,
    };

    await ctx.db("article").insert(row);

    logger.info("Created article", { id: row.id, slug, status });
    return success(mapArticleFromDb(row));
  } catch (error) {
    logger.error("Failed to create article", { error });
    return failure(toError(error));
  }
}
