import { Result, success, failure, toError } from "../../lib/core/index.js";
import { createLogger } from "../../lib/logger/index.js";
import {
  countRows,
  whereContains,
  type CategoryDbRow,
} from "../../lib/db/index.js";
import type { DataContext } from "../data-context.js";
import type {
  Category,
  CategoryType,
  PaginatedResult,
} from "../../types.js";
import { mapCategoryFromDb } from "../../mappers.js";

const logger = createLogger("printhub:domain:category");

export type ListCategoriesParams = {
  type?: CategoryType;
  activeOnly?: boolean;
  search?: string;
  limit?: number;
  offset?: number;
};

/**
 * List categories ordered by name. `search` matches name or description.
 */
export async function listCategories(
  ctx: DataContext,
  params: ListCategoriesParams = {},
): Promise<Result<PaginatedResult<Category>, Error>> {
  try {
    const limit = params.limit ?? 100;
    const offset = params.offset ?? 0;

    const query = ctx.db<CategoryDbRow>("category");
    if (params.type) query.where("type", params.type);
    if (params.activeOnly) query.where("is_active", true);
    if (params.search) {
      whereContains(query, ["name", "description"], params.search);
    }

    const total = await countRows(query);
    const rows: CategoryDbRow[] = await query
      .clone()
      .orderBy("name", "asc")
      .limit(limit)
      .offset(offset);

    return success({
      data: rows.map(mapCategoryFromDb),
      pagination: { total, limit, offset },
    });
  } catch (error) {
    logger.error("Failed to list categories", { error });
    return failure(toError(error));
  }
}
