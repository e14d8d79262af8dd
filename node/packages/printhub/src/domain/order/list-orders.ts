import { Result, success, failure, toError } from "../../lib/core/index.js";
import { createLogger } from "../../lib/logger/index.js";
import { countRows, type OrderDbRow } from "../../lib/db/index.js";
import type { DataContext } from "../data-context.js";
import type { Order, OrderStatus, PaginatedResult } from "../../types.js";
import { mapOrderFromDb } from "../../mappers.js";

const logger = createLogger("printhub:domain:order");

export type ListOrdersParams = {
  status?: OrderStatus;
  limit?: number;
  offset?: number;
};

export async function listOrders(
  ctx: DataContext,
  params: ListOrdersParams = {},
): Promise<Result<PaginatedResult<Order>, Error>> {
  try {
    const limit = params.limit ?? 100;
    const offset = params.offset ?? 0;

    const query = ctx.db<OrderDbRow>("order");
    if (params.status) query.where("status", params.status);

    const total = await countRows(query);
    const rows: OrderDbRow[] = await query
      .clone()
      .orderBy("created_at", "desc")
      .limit(limit)
      .offset(offset);

    return success({
      data: rows.map(mapOrderFromDb),
      pagination: { total, limit, offset },
    });
  } catch (error) {
    logger.error("Failed to list orders", { error });
    return failure(toError(error));
  }
}

/**
 * A customer's orders, newest first. Email comparison ignores case.
 */
export async function findOrdersByEmail(
  ctx: DataContext,
  email: string,
): Promise<Result<Order[], Error>> {
  try {
    const rows: OrderDbRow[] = await ctx
      .db<OrderDbRow>("order")
      .whereRaw("lower(customer_email) = ?", [email.trim().toLowerCase()])
      .orderBy("created_at", "desc");
    return success(rows.map(mapOrderFromDb));
  } catch (error) {
    logger.error("Failed to search orders by email", { error });
    return failure(toError(error));
  }
}
