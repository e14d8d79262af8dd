import { basename } from "path";
import { Request, Response } from "express";
import { createLogger } from "../../lib/logger/index.js";
import { handleException, sendError } from "../../lib/http/index.js";
import type { DataContext } from "../../domain/data-context.js";
import { getProject } from "../../domain/project/get-project.js";

const logger = createLogger("printhub:handlers:projects:get");

// Lifetime of the redirect URL handed out for S3-stored models
const STL_URL_EXPIRY_SECONDS = 3600;

/**
 * GET /api/v1/projects/:id
 */
export function getProjectHandler(ctx: DataContext) {
  return async (req: Request<{ id: string }>, res: Response): Promise<void> => {
    try {
      const result = await getProject(ctx, req.params.id);

      if (!result.success) {
        sendError(res, result.error);
        return;
      }

      if (!result.data) {
        res.status(404).json({ error: "Project not found" });
        return;
      }

      res.json(result.data);
    } catch (error) {
      handleException(res, error, logger, "Failed to get project", {
        id: req.params.id,
      });
    }
  };
}

/**
 * GET /api/v1/projects/:id/stl - Download the project's model
 */
export function downloadProjectStlHandler(ctx: DataContext) {
  return async (req: Request<{ id: string }>, res: Response): Promise<void> => {
    try {
      const result = await getProject(ctx, req.params.id);

      if (!result.success) {
        sendError(res, result.error);
        return;
      }

      const key = result.data?.stlFile;
      if (!key) {
        res.status(404).json({ error: "STL file not found" });
        return;
      }

      if (ctx.storage.kind === "s3") {
        res.redirect(
          await ctx.storage.presignedUrl(key, STL_URL_EXPIRY_SECONDS),
        );
        return;
      }

      const file = await ctx.storage.read(key);
      if (!file) {
        res.status(404).json({ error: "STL file not found" });
        return;
      }

      // attachment() sets a type from the extension; ours must win
      res
        .status(200)
        .attachment(basename(key))
        .type(file.contentType ?? "model/stl")
        .send(file.body);
    } catch (error) {
      handleException(res, error, logger, "Failed to download STL file", {
        id: req.params.id,
      });
    }
  };
}
