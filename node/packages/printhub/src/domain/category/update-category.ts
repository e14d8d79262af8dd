import {
  Result,
  success,
  failure,
  ConflictError,
  NotFoundError,
  toError,
} from "../../lib/core/index.js";
import { createLogger } from "../../lib/logger/index.js";
import type { CategoryDbRow } from "../../lib/db/index.js";
import type { DataContext } from "../data-context.js";
import type { Category, UpdateCategoryInput } from "../../types.js";
import { mapCategoryFromDb } from "../../mappers.js";
import { findCategoryConflict } from "./find-category-conflict.js";

const logger = createLogger("printhub:domain:category");

export async function updateCategory(
  ctx: DataContext,
  id: string,
  input: UpdateCategoryInput,
): Promise<Result<Category, Error>> {
  try {
    const existing = await ctx
      .db<CategoryDbRow>("category")
      .where("id", id)
      .first();
    if (!existing) {
      return failure(new NotFoundError("Category", id));
    }

    const conflict = await findCategoryConflict(ctx, input.name, input.slug, id);
    if (conflict) {
      return failure(new ConflictError(conflict));
    }

    const changes: Partial<CategoryDbRow> = { updated_at: Date.now() };
    if (input.name !== undefined) changes.name = input.name;
    if (input.slug !== undefined) changes.slug = input.slug;
    if (input.description !== undefined) changes.description = input.description;
    if (input.isActive !== undefined) changes.is_active = input.isActive;
    if (input.type !== undefined) changes.type = input.type;

    await ctx.db("category").where("id", id).update(changes);

    logger.info("Updated category", { id });
    return success(mapCategoryFromDb({ ...existing, ...changes }));
  } catch (error) {
    logger.error("Failed to update category", { error, id });
    return failure(toError(error));
  }
}

/**
 * Categories are never removed: deleting one deactivates it
 */
export function setCategoryActive(
  ctx: DataContext,
  id: string,
  isActive: boolean,
): Promise<Result<Category, Error>> {
  return updateCategory(ctx, id, { isActive });
}
