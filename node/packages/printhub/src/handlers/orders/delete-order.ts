import { Request, Response } from "express";
import { createLogger } from "../../lib/logger/index.js";
import { handleException, sendError } from "../../lib/http/index.js";
import type { DataContext } from "../../domain/data-context.js";
import { deleteOrder } from "../../domain/order/delete-order.js";

const logger = createLogger("printhub:handlers:orders:delete");

/**
 * DELETE /api/v1/orders/:id (admin)
 */
export function deleteOrderHandler(ctx: DataContext) {
  return async (req: Request<{ id: string }>, res: Response): Promise<void> => {
    try {
      const result = await deleteOrder(ctx, req.params.id);

      if (!result.success) {
        sendError(res, result.error);
        return;
      }

      res.status(204).end();
    } catch (error) {
      handleException(res, error, logger, "Error deleting order", {
        id: req.params.id,
      });
    }
  };
}
