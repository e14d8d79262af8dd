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
import type { CategoryDbRow } from "../../lib/db/index.js";
import type { DataContext } from "../data-context.js";
import type { Category, CreateCategoryInput } from "../../types.js";
import { mapCategoryFromDb } from "../../mappers.js";
import { findCategoryConflict } from "./find-category-conflict.js";

const logger = createLogger("printhub:domain:category");

/**
 * Create a category. The slug is derived from the name when not given.
 */
export async function createCategory(
  ctx: DataContext,
  input: CreateCategoryInput,
): Promise<Result<Category, Error>> {
  try {
    const slug = input.slug ?? slugify(input.name);
    const conflict = await findCategoryConflict(ctx, input.name, slug);
    if (conflict) {
      return failure(new ConflictError(conflict));
    }

    const now = Date.now();
    const row: CategoryDbRow = {
      id: uuidv4(),
      name: input.name,
      slug,
      description: input.description ?? null,
      is_active: input.isActive ?? true,
      type: input.type,
      created_at: now,
      updated_at: now,
    };

    await ctx.db("category").insert(row);

    logger.info("Created category", { id: row.id, slug });
    return success(mapCategoryFromDb(row));
  } catch (error) {
    logger.error("Failed to create category", { error });
    return failure(toError(error));
  }
}
