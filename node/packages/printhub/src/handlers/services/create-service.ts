import { Request, Response } from "express";
import { z } from "zod";
import { createLogger } from "../../lib/logger/index.js";
import { handleException, sendError } from "../../lib/http/index.js";
import type { DataContext } from "../../domain/data-context.js";
import { createService } from "../../domain/service/create-service.js";

const logger = createLogger("printhub:handlers:services:create");

export const createServiceSchema = z.object({
  name: z.string().min(1).max(100),
  description: z.string().optional(),
  category: z.string().max(50).optional(),
  features: z.array(z.string()).optional(),
  icon: z.string().max(50).optional(),
  isActive: z.boolean().optional(),
});

/**
 * POST /api/v1/services (admin)
 */
export function createServiceHandler(ctx: DataContext) {
  return async (req: Request, res: Response): Promise<void> => {
    try {
      const input = createServiceSchema.parse(req.body);
      const result = await createService(ctx, input);

      if (!result.success) {
        sendError(res, result.error);
        return;
      }

      res.status(201).json(result.data);
    } catch (error) {
      handleException(res, error, logger, "Failed to create service");
    }
  };
}
