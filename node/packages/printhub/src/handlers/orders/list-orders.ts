import { Request, Response } from "express";
import { z } from "zod";
import { createLogger } from "../../lib/logger/index.js";
import {
  handleException,
  paginationQuery,
  sendError,
} from "../../lib/http/index.js";
import type { DataContext } from "../../domain/data-context.js";
import {
  findOrdersByEmail,
  listOrders,
} from "../../domain/order/list-orders.js";

const logger = createLogger("printhub:handlers:orders:list");

export const orderStatusSchema = z.enum([
  "new",
  "in_progress",
  "completed",
  "cancelled",
]);

const listOrdersQuery = paginationQuery.extend({
  status: orderStatusSchema.optional(),
});

const searchOrdersQuery = z.object({
  email: z.string().trim().includes("@", { message: "Invalid email address" }),
});

/**
 * GET /api/v1/orders (admin)
 */
export function listOrdersHandler(ctx: DataContext) {
  return async (req: Request, res: Response): Promise<void> => {
    try {
      const params = listOrdersQuery.parse(req.query);
      const result = await listOrders(ctx, params);

      if (!result.success) {
        sendError(res, result.error);
        return;
      }

      res.json(result.data);
    } catch (error) {
      handleException(res, error, logger, "Error listing orders");
    }
  };
}

/**
 * GET /api/v1/orders/search?email= - A customer's own orders
 */
export function searchOrdersHandler(ctx: DataContext) {
  return async (req: Request, res: Response): Promise<void> => {
    try {
      const { email } = searchOrdersQuery.parse(req.query);
      const result = await findOrdersByEmail(ctx, email);

      if (!result.success) {
        sendError(res, result.error);
        return;
      }

      res.json(result.data);
    } catch (error) {
      handleException(res, error, logger, "Error searching orders");
    }
  };
}
