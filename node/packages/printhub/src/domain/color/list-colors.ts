import { Result, success, failure, toError } from "../../lib/core/index.js";
import { createLogger } from "../../lib/logger/index.js";
import type { ColorDbRow } from "../../lib/db/index.js";
import type { DataContext } from "../data-context.js";
import type { Color, ColorType } from "../../types.js";
import { mapColorFromDb } from "../../mappers.js";

const logger = createLogger("printhub:domain:color");

export type ListColorsParams = {
  activeOnly?: boolean;
  type?: ColorType;
};

/**
 * Palette ordered by sort order, then name
 */
export async function listColors(
  ctx: DataContext,
  params: ListColorsParams = {},
): Promise<Result<Color[], Error>> {
  try {
    const query = ctx.db<ColorDbRow>("color");
    if (params.activeOnly) query.where("is_active", true);
    if (params.type) query.where("type", params.type);

    const rows: ColorDbRow[] = await query.orderBy([
      { column: "sort_order", order: "asc" },
      { column: "name", order: "asc" },
    ]);
    return success(rows.map(mapColorFromDb));
  } catch (error) {
    logger.error("Failed to list colors", { error });
    return failure(toError(error));
  }
}

export async function getColor(
  ctx: DataContext,
  id: string,
): Promise<Result<Color | null, Error>> {
  try {
    const row = await ctx.db<ColorDbRow>("color").where("id", id).first();
    return success(row ? mapColorFromDb(row) : null);
  } catch (error) {
    logger.error("Failed to get color", { error, id });
    return failure(toError(error));
  }
}
