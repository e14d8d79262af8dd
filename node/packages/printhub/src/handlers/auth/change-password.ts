import { Request, Response } from "express";
import { z } from "zod";
import { createLogger } from "../../lib/logger/index.js";
import { handleException, sendError } from "../../lib/http/index.js";
import type { DataContext } from "../../domain/data-context.js";
import { changePassword } from "../../domain/user/change-password.js";

const logger = createLogger("printhub:handlers:auth:change-password");

export const changePasswordSchema = z.object({
  currentPassword: z.string().min(1),
  newPassword: z.string().min(8),
});

/**
 * POST /api/v1/auth/change-password
 */
export function changePasswordHandler(ctx: DataContext) {
  return async (req: Request, res: Response): Promise<void> => {
    try {
      const input = changePasswordSchema.parse(req.body);
      if (!req.user) {
        res.status(401).json({ error: "Not authenticated" });
        return;
      }

      const result = await changePassword(
        ctx,
        req.user.id,
        input.currentPassword,
        input.newPassword,
      );

      if (!result.success) {
        sendError(res, result.error);
        return;
      }

      res.status(204).end();
    } catch (error) {
      handleException(res, error, logger, "Failed to change password");
    }
  };
}
