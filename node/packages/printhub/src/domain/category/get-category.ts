import { Result, success, failure, toError } from "../../lib/core/index.js";
import { createLogger } from "../../lib/logger/index.js";
import type { CategoryDbRow } from "../../lib/db/index.js";
import type { DataContext } from "../data-context.js";
import type { Category } from "../../types.js";
import { mapCategoryFromDb } from "../../mappers.js";

const logger = createLogger("printhub:domain:category");

export async function getCategory(
  ctx: DataContext,
  id: string,
): Promise<Result<Category | null, Error>> {
  try {
    const row = await ctx.db<CategoryDbRow>("category").where("id", id).first();
    return success(row ? mapCategoryFromDb(row) : null);
  } catch (error) {
    logger.error("Failed to get category", { error, id });
    return failure(toError(error));
  }
}

export async function getCategoryBySlug(
  ctx: DataContext,
  slug: string,
): Promise<Result<Category | null, Error>> {
  try {
    const row = await ctx
      .db<CategoryDbRow>("category")
      .where("slug", slug)
      .first();
    return success(row ? mapCategoryFromDb(row) : null);
  } catch (error) {
    logger.error("Failed to get category by slug", { error, slug });
    return failure(toError(error));
  }
}
