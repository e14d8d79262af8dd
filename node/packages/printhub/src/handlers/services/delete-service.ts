import { Request, Response } from "express";
import { createLogger } from "../../lib/logger/index.js";
import { handleException, sendError } from "../../lib/http/index.js";
import type { DataContext } from "../../domain/data-context.js";
import { deleteService } from "../../domain/service/delete-service.js";

const logger = createLogger("printhub:handlers:services:delete");

/**
 * DELETE /api/v1/services/:id (admin)
 */
export function deleteServiceHandler(ctx: DataContext) {
  return async (req: Request<{ id: string }>, res: Response): Promise<void> => {
    try {
      const result = await deleteService(ctx, req.params.id);

      if (!result.success) {
        sendError(res, result.error);
        return;
      }

      res.status(204).end();
    } catch (error) {
      handleException(res, error, logger, "Error deleting service", {
        id: req.params.id,
      });
    }
  };
}
