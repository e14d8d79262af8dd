import {
  Result,
  success,
  failure,
  NotFoundError,
  toError,
} from "../../lib/core/index.js";
import { createLogger } from "../../lib/logger/index.js";
import type { OrderDbRow } from "../../lib/db/index.js";
import type { DataContext } from "../data-context.js";
import type { OrderStatusChange, OrderStatusChangeInput } from "../../types.js";
import { mapOrderFromDb } from "../../mappers.js";

const logger = createLogger("printhub:domain:order");

/**
 * Push a status change to the bot without touching the stored order.
 * Used when the status was changed elsewhere (the bot itself, a manual fix).
 */
export async function announceOrderStatusChange(
  ctx: DataContext,
  input: OrderStatusChangeInput,
): Promise<Result<OrderStatusChange, Error>> {
  try {
    const row = await ctx
      .db<OrderDbRow>("order")
      .where("id", input.orderId)
      .first();
    if (!row) {
      return failure(new NotFoundError("Order", input.orderId));
    }

    const order = mapOrderFromDb(row);
    const notified = await ctx.notifier.notify("status_change", {
      ...order,
      status: input.newStatus,
      previousStatus: order.status,
      userId: input.userId,
    });

    logger.info("Status change announced", {
      id: input.orderId,
      status: input.newStatus,
      notified,
    });
    return success({ ...input, notified });
  } catch (error) {
    logger.error("Failed to announce status change", {
      error,
      id: input.orderId,
    });
    return failure(toError(error));
  }
}
