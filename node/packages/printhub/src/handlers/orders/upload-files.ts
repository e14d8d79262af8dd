import { Request, Response } from "express";
import { createLogger } from "../../lib/logger/index.js";
import {
  handleException,
  sendError,
  uploadedFiles,
} from "../../lib/http/index.js";
import type { DataContext } from "../../domain/data-context.js";
import { addOrderFiles } from "../../domain/order/add-order-files.js";

const logger = createLogger("printhub:handlers:orders:upload");

/**
 * POST /api/v1/orders/:id/files - multipart field `files`
 */
export function uploadOrderFilesHandler(ctx: DataContext) {
  return async (req: Request<{ id: string }>, res: Response): Promise<void> => {
    try {
      const files = uploadedFiles(req);
      if (files.length === 0) {
        res.status(400).json({ error: "No files uploaded" });
        return;
      }

      const result = await addOrderFiles(ctx, req.params.id, files);

      if (!result.success) {
        sendError(res, result.error);
        return;
      }

      res.status(201).json(result.data);
    } catch (error) {
      handleException(res, error, logger, "Failed to upload order files", {
        id: req.params.id,
      });
    }
  };
}
