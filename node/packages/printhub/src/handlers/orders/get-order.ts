import { Request, Response } from "express";
import { createLogger } from "../../lib/logger/index.js";
import { handleException, sendError } from "../../lib/http/index.js";
import type { DataContext } from "../../domain/data-context.js";
import { getOrder } from "../../domain/order/get-order.js";

const logger = createLogger("printhub:handlers:orders:get");

/**
 * GET /api/v1/orders/:id (admin) - Order with its files
 */
export function getOrderHandler(ctx: DataContext) {
  return async (req: Request<{ id: string }>, res: Response): Promise<void> => {
    try {
      const result = await getOrder(ctx, req.params.id);

      if (!result.success) {
        sendError(res, result.error);
        return;
      }

      if (!result.data) {
        res.status(404).json({ error: "Order not found" });
        return;
      }

      res.json(result.data);
    } catch (error) {
      handleException(res, error, logger, "Failed to get order", {
        id: req.params.id,
      });
    }
  };
}
