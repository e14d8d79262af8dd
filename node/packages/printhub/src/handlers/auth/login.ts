import { Request, Response } from "express";
import { z } from "zod";
import { createLogger } from "../../lib/logger/index.js";
import { handleException, sendError } from "../../lib/http/index.js";
import type { DataContext } from "../../domain/data-context.js";
import { authenticate } from "../../domain/user/authenticate.js";

const logger = createLogger("printhub:handlers:auth:login");

export const loginSchema = z.object({
  username: z.string().min(1),
  password: z.string().min(1),
});

/**
 * POST /api/v1/auth/login - JSON credentials
 * POST /api/v1/auth/login/token - OAuth2 password form (urlencoded)
 */
export function loginHandler(ctx: DataContext) {
  return async (req: Request, res: Response): Promise<void> => {
    try {
      const input = loginSchema.parse(req.body);
      const result = await authenticate(ctx, input.username, input.password);

      if (!result.success) {
        sendError(res, result.error);
        return;
      }

      res.json(result.data);
    } catch (error) {
      handleException(res, error, logger, "Failed to log in");
    }
  };
}
