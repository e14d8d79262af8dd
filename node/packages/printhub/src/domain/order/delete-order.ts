import {
  Result,
  success,
  failure,
  NotFoundError,
  toError,
} from "../../lib/core/index.js";
import { createLogger } from "../../lib/logger/index.js";
import type { OrderFileDbRow } from "../../lib/db/index.js";
import type { DataContext } from "../data-context.js";

const logger = createLogger("printhub:domain:order");

/**
 * Delete an order with its file records and stored files
 */
export async function deleteOrder(
  ctx: DataContext,
  id: string,
): Promise<Result<void, Error>> {
  try {
    const files = await ctx
      .db<OrderFileDbRow>("order_file")
      .where("order_id", id);

    const deleted = await ctx.db.transaction(async (trx): Promise<number> => {
      await trx("order_file").where("order_id", id).delete();
      return trx("order").where("id", id).delete();
    });
    if (deleted === 0) {
      return failure(new NotFoundError("Order", id));
    }

    for (const file of files) {
      await ctx.storage.delete(file.file_path).catch((error: unknown) => {
        logger.warn("Failed to delete order file", {
          id,
          key: file.file_path,
          error,
        });
      });
    }

    logger.info("Deleted order", { id, files: files.length });
    return success(undefined);
  } catch (error) {
    logger.error("Failed to delete order", { error, id });
    return failure(toError(error));
  }
}
