import {
  Result,
  success,
  failure,
  ConflictError,
  NotFoundError,
  toError,
} from "../../lib/core/index.js";
import { createLogger } from "../../lib/logger/index.js";
import { toJson, type ArticleDbRow } from "../../lib/db/index.js";
import type { DataContext } from "../data-context.js";
import type { Article, UpdateArticleInput } from "../../types.js";
import { mapArticleFromDb } from "../../mappers.js";
import { isArticleSlugTaken } from "./find-slug-conflict.js";

const logger = createLogger("printhub:domain:article");

/**
 * Publishing sets `published_at` the first time only; returning to draft
 * unpublishes but keeps the original date.
 */
export async function updateArticle(
  ctx: DataContext,
  id: string,
  input: UpdateArticleInput,
): Promise<Result<Article, Error>> {
  try {
    const existing = await ctx
      .db<ArticleDbRow>("article")
      .where("id", id)
      .first();
    if (!existing) {
      return failure(new NotFoundError("Article", id));
    }

    if (input.slug !== undefined && (await isArticleSlugTaken(ctx, input.slug, id))) {
      return failure(
        new ConflictError(`Article with slug "${input.slug}" already exists`),
      );
    }

    const now = Date.now();
    const changes: Partial<ArticleDbRow> = { updated_at: now };
    if (input.title !== undefined) changes.title = input.title;
    if (input.slug !== undefined) changes.slug = input.slug;
    if (input.content !== undefined) changes.content = input.content;
    if (input.excerpt !== undefined) changes.excerpt = input.excerpt;
    if (input.featuredImage !== undefined) {
      changes.featured_image = input.featuredImage;
    }
    if (input.category !== undefined) changes.category = input.category;
    if (input.tags !== undefined) changes.tags = toJson(input.tags);

    if (input.status === "published") {
      changes.status = "published";
      changes.is_published = true;
      if (existing.published_at === null) changes.published_at = now;
    } else if (input.status === "draft") {
      changes.status = "draft";
      changes.is_published = false;
    }

    await ctx.db("article").where("id", id).update(changes);

    logger.info("Updated article", { id });
    return success(mapArticleFromDb({ ...existing, ...changes }));
  } catch (error) {
    logger.error("Failed to update article", { error, id });
    return failure(toError(error));
  }
}
