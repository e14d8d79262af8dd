import { Request, Response } from "express";
import { z } from "zod";
import { createLogger } from "../../lib/logger/index.js";
import { handleException, sendError } from "../../lib/http/index.js";
import type { DataContext } from "../../domain/data-context.js";
import { updateOrder } from "../../domain/order/update-order.js";
import { announceOrderStatusChange } from "../../domain/order/announce-status-change.js";
import { orderStatusSchema } from "./list-orders.js";

const logger = createLogger("printhub:handlers:orders:update");

export const updateOrderSchema = z.object({
  status: orderStatusSchema.optional(),
  totalPrice: z.number().min(0).nullable().optional(),
  notes: z.string().nullable().optional(),
  specifications: z.record(z.unknown()).nullable().optional(),
});

/**
 * PUT /api/v1/orders/:id (admin)
 */
export function updateOrderHandler(ctx: DataContext) {
  return async (req: Request<{ id: string }>, res: Response): Promise<void> => {
    try {
      const input = updateOrderSchema.parse(req.body);
      const result = await updateOrder(ctx, req.params.id, input);

      if (!result.success) {
        sendError(res, result.error);
        return;
      }

      res.json(result.data);
    } catch (error) {
      handleException(res, error, logger, "Error updating order", {
        id: req.params.id,
      });
    }
  };
}

export const statusChangeSchema = z.object({
  orderId: z.string().min(1),
  newStatus: orderStatusSchema,
  userId: z.string().min(1).optional(),
});

/**
 * POST /api/v1/orders/webhook/status-change (admin)
 */
export function orderStatusChangeWebhookHandler(ctx: DataContext) {
  return async (req: Request, res: Response): Promise<void> => {
    try {
      const input = statusChangeSchema.parse(req.body);
      const result = await announceOrderStatusChange(ctx, input);

      if (!result.success) {
        sendError(res, result.error);
        return;
      }

      res.json(result.data);
    } catch (error) {
      handleException(res, error, logger, "Error processing status change webhook");
    }
  };
}
