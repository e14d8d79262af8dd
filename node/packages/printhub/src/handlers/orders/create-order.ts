import { Request, Response } from "express";
import { z } from "zod";
import { createLogger } from "../../lib/logger/index.js";
import { handleException, sendError } from "../../lib/http/index.js";
import type { DataContext } from "../../domain/data-context.js";
import { createOrder } from "../../domain/order/create-order.js";

const logger = createLogger("printhub:handlers:orders:create");

export const createOrderSchema = z.object({
  customerName: z.string().min(1).max(100),
  customerEmail: z.string().email().max(200).optional(),
  customerPhone: z.string().max(50).optional(),
  customerContact: z.string().max(200).optional(),
  alternativeContact: z.string().max(200).optional(),
  serviceId: z.string().min(1),
  specifications: z.record(z.unknown()).optional(),
  source: z.enum(["web", "telegram"]).default("web"),
  notes: z.string().optional(),
  deliveryNeeded: z.string().max(10).optional(),
  deliveryDetails: z.string().optional(),
});

/**
 * POST /api/v1/orders - Public order form (web or Telegram bot)
 */
export function createOrderHandler(ctx: DataContext) {
  return async (req: Request, res: Response): Promise<void> => {
    try {
      const input = createOrderSchema.parse(req.body);
      const result = await createOrder(ctx, {
        ...input,
        customerId: req.user?.id,
      });

      if (!result.success) {
        sendError(res, result.error);
        return;
      }

      res.status(201).json(result.data);
    } catch (error) {
      handleException(res, error, logger, "Failed to create order");
    }
  };
}
