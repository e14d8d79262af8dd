import { Request, Response } from "express";
import { createLogger } from "../../lib/logger/index.js";
import { handleException, sendError } from "../../lib/http/index.js";
import type { DataContext } from "../../domain/data-context.js";
import { deleteUser } from "../../domain/user/delete-user.js";

const logger = createLogger("printhub:handlers:users:delete");

/**
 * DELETE /api/v1/users/:id
 */
export function deleteUserHandler(ctx: DataContext) {
  return async (req: Request<{ id: string }>, res: Response): Promise<void> => {
    try {
      if (req.user?.id === req.params.id) {
        res.status(400).json({ error: "Cannot delete your own account" });
        return;
      }

      const result = await deleteUser(ctx, req.params.id);

      if (!result.success) {
        sendError(res, result.error);
        return;
      }

      res.status(204).end();
    } catch (error) {
      handleException(res, error, logger, "Error deleting user", {
        id: req.params.id,
      });
    }
  };
}
