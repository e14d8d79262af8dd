import { Result, success, failure, toError } from "../../lib/core/index.js";
import { createLogger } from "../../lib/logger/index.js";
import type { OrderDbRow, OrderFileDbRow } from "../../lib/db/index.js";
import type { DataContext } from "../data-context.js";
import type { OrderWithFiles } from "../../types.js";
import { mapOrderFileFromDb, mapOrderFromDb } from "../../mappers.js";

const logger = createLogger("printhub:domain:order");

export async function getOrder(
  ctx: DataContext,
  id: string,
): Promise<Result<OrderWithFiles | null, Error>> {
  try {
    const row = await ctx.db<OrderDbRow>("order").where("id", id).first();
    if (!row) {
      return success(null);
    }

    const files = await ctx
      .db<OrderFileDbRow>("order_file")
      .where("order_id", id)
      .orderBy("created_at", "asc");

    return success({
      ...mapOrderFromDb(row),
      files: files.map(mapOrderFileFromDb),
    });
  } catch (error) {
    logger.error("Failed to get order", { error, id });
    return failure(toError(error));
  }
}
