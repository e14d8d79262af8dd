import { v4 as uuidv4 } from "uuid";
import {
  Result,
  success,
  failure,
  NotFoundError,
  toError,
} from "../../lib/core/index.js";
import { createLogger } from "../../lib/logger/index.js";
import type { OrderDbRow, OrderFileDbRow } from "../../lib/db/index.js";
import type { DataContext } from "../data-context.js";
import type { OrderFile } from "../../types.js";
import {
  discardStored,
  storeUploads,
  type UploadedFile,
} from "../file/store-upload.js";
import { mapOrderFileFromDb } from "../../mappers.js";

const logger = createLogger("printhub:domain:order");

/**
 * Store customer files (models, references) for an order
 */
export async function addOrderFiles(
  ctx: DataContext,
  orderId: string,
  files: UploadedFile[],
): Promise<Result<OrderFile[], Error>> {
  try {
    const order = await ctx
      .db<OrderDbRow>("order")
      .where("id", orderId)
      .first();
    if (!order) {
      return failure(new NotFoundError("Order", orderId));
    }

    const stored = await storeUploads(ctx, `orders/${orderId}`, files);
    if (!stored.success) {
      return stored;
    }

    const now = Date.now();
    const rows: OrderFileDbRow[] = stored.data.map((file) => ({
      id: uuidv4(),
      order_id: orderId,
      file_path: file.key,
      original_filename: file.filename,
      file_size: file.size,
      file_type: file.contentType,
      created_at: now,
      updated_at: now,
    }));

    if (rows.length > 0) {
      try {
        await ctx.db("order_file").insert(rows);
      } catch (error) {
        await discardStored(
          ctx,
          rows.map((row) => row.file_path),
        );
        throw error;
      }
    }

    logger.info("Attached files to order", { orderId, count: rows.length });
    return success(rows.map(mapOrderFileFromDb));
  } catch (error) {
    logger.error("Failed to attach order files", { error, orderId });
    return failure(toError(error));
  }
}
