import { Request, Response } from "express";
import { createLogger } from "../../lib/logger/index.js";
import { handleException, sendError } from "../../lib/http/index.js";
import type { DataContext } from "../../domain/data-context.js";
import { deleteProject } from "../../domain/project/delete-project.js";

const logger = createLogger("printhub:handlers:projects:delete");

/**
 * DELETE /api/v1/projects/:id (admin)
 */
export function deleteProjectHandler(ctx: DataContext) {
  return async (req: Request<{ id: string }>, res: Response): Promise<void> => {
    try {
      const result = await deleteProject(ctx, req.params.id);

      if (!result.success) {
        sendError(res, result.error);
        return;
      }

      res.status(204).end();
    } catch (error) {
      handleException(res, error, logger, "Error deleting project", {
        id: req.params.id,
      });
    }
  };
}
