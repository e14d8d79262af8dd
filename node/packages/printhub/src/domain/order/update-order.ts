import {
  Result,
  success,
  failure,
  NotFoundError,
  toError,
} from "../../lib/core/index.js";
import { createLogger } from "../../lib/logger/index.js";
import { toJson, type OrderDbRow } from "../../lib/db/index.js";
import { notifyStatusChange } from "../../lib/notifications/index.js";
import type { DataContext } from "../data-context.js";
import type { Order, UpdateOrderInput } from "../../types.js";
import { mapOrderFromDb } from "../../mappers.js";

const logger = createLogger("printhub:domain:order");

export async function updateOrder(
  ctx: DataContext,
  id: string,
  input: UpdateOrderInput,
): Promise<Result<Order, Error>> {
  try {
    const existing = await ctx.db<OrderDbRow>("order").where("id", id).first();
    if (!existing) {
      return failure(new NotFoundError("Order", id));
    }

    const changes: Partial<OrderDbRow> = { updated_at: Date.now() };
    if (input.status !== undefined) changes.status = input.status;
    if (input.totalPrice !== undefined) changes.total_price = input.totalPrice;
    if (input.notes !== undefined) changes.notes = input.notes;
    if (input.specifications !== undefined) {
      changes.specifications = toJson(input.specifications);
    }

    await ctx.db("order").where("id", id).update(changes);

    const order = mapOrderFromDb({ ...existing, ...changes });
    logger.info("Updated order", { id, status: order.status });

    if (input.status !== undefined && input.status !== existing.status) {
      notifyStatusChange(ctx.notifier, order).catch((error: unknown) => {
        logger.error("Status change notification failed", { id, error });
      });
    }

    return success(order);
  } catch (error) {
    logger.error("Failed to update order", { error, id });
    return failure(toError(error));
  }
}
