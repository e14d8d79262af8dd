import { Request, Response } from "express";
import { z } from "zod";
import { createLogger } from "../../lib/logger/index.js";
import { handleException, sendError } from "../../lib/http/index.js";
import type { DataContext } from "../../domain/data-context.js";
import {
  setServiceActive,
  updateService,
} from "../../domain/service/update-service.js";

const logger = createLogger("printhub:handlers:services:update");

export const updateServiceSchema = z.object({
  name: z.string().min(1).max(100).optional(),
  description: z.string().nullable().optional(),
  category: z.string().max(50).nullable().optional(),
  features: z.array(z.string()).optional(),
  icon: z.string().max(50).nullable().optional(),
  isActive: z.boolean().optional(),
});

/**
 * PUT /api/v1/services/:id (admin)
 */
export function updateServiceHandler(ctx: DataContext) {
  return async (req: Request<{ id: string }>, res: Response): Promise<void> => {
    try {
      const input = updateServiceSchema.parse(req.body);
      const result = await updateService(ctx, req.params.id, input);

      if (!result.success) {
        sendError(res, result.error);
        return;
      }

      res.json(result.data);
    } catch (error) {
      handleException(res, error, logger, "Error updating service", {
        id: req.params.id,
      });
    }
  };
}

/**
 * POST /api/v1/services/:id/activate and PUT /api/v1/services/:id/deactivate
 */
export function setServiceActiveHandler(ctx: DataContext, isActive: boolean) {
  return async (req: Request<{ id: string }>, res: Response): Promise<void> => {
    try {
      const result = await setServiceActive(ctx, req.params.id, isActive);

      if (!result.success) {
        sendError(res, result.error);
        return;
      }

      res.json(result.data);
    } catch (error) {
      handleException(res, error, logger, "Error changing service state", {
        id: req.params.id,
        isActive,
      });
    }
  };
}
