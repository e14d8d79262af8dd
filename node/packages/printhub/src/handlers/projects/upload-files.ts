import { Request, Response } from "express";
import { createLogger } from "../../lib/logger/index.js";
import {
  handleException,
  sendError,
  uploadedFiles,
} from "../../lib/http/index.js";
import type { DataContext } from "../../domain/data-context.js";
import {
  addProjectImages,
  setProjectStl,
} from "../../domain/project/attach-files.js";

const logger = createLogger("printhub:handlers:projects:upload");

/**
 * POST /api/v1/projects/:id/stl - multipart field `file`
 */
export function uploadProjectStlHandler(ctx: DataContext) {
  return async (req: Request<{ id: string }>, res: Response): Promise<void> => {
    try {
      if (!req.file) {
        res.status(400).json({ error: "No file uploaded" });
        return;
      }

      const result = await setProjectStl(ctx, req.params.id, req.file);

      if (!result.success) {
        sendError(res, result.error);
        return;
      }

      res.json(result.data);
    } catch (error) {
      handleException(res, error, logger, "Failed to upload STL file", {
        id: req.params.id,
      });
    }
  };
}

/**
 * POST /api/v1/projects/:id/images - multipart field `files`
 */
export function uploadProjectImagesHandler(ctx: DataContext) {
  return async (req: Request<{ id: string }>, res: Response): Promise<void> => {
    try {
      const files = uploadedFiles(req);
      if (files.length === 0) {
        res.status(400).json({ error: "No files uploaded" });
        return;
      }

      const result = await addProjectImages(ctx, req.params.id, files);

      if (!result.success) {
        sendError(res, result.error);
        return;
      }

      res.json(result.data);
    } catch (error) {
      handleException(res, error, logger, "Failed to upload project images", {
        id: req.params.id,
      });
    }
  };
}
