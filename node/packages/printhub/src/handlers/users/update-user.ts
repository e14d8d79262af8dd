import { Request, Response } from "express";
import { z } from "zod";
import { createLogger } from "../../lib/logger/index.js";
import { handleException, sendError } from "../../lib/http/index.js";
import type { DataContext } from "../../domain/data-context.js";
import { updateUser } from "../../domain/user/update-user.js";

const logger = createLogger("printhub:handlers:users:update");

export const updateUserSchema = z.object({
  username: z.string().min(3).max(50).optional(),
  email: z.string().email().max(100).optional(),
  password: z.string().min(8).optional(),
  fullName: z.string().max(100).nullable().optional(),
  role: z.enum(["user", "admin"]).optional(),
  isActive: z.boolean().optional(),
});

/**
 * PUT /api/v1/users/:id
 */
export function updateUserHandler(ctx: DataContext) {
  return async (req: Request<{ id: string }>, res: Response): Promise<void> => {
    try {
      const input = updateUserSchema.parse(req.body);

      if (req.user?.id === req.params.id && input.role === "user") {
        res.status(400).json({ error: "Cannot remove your own admin role" });
        return;
      }

      const result = await updateUser(ctx, req.params.id, input);

      if (!result.success) {
        sendError(res, result.error);
        return;
      }

      res.json(result.data);
    } catch (error) {
      handleException(res, error, logger, "Error updating user", {
        id: req.params.id,
      });
    }
  };
}
