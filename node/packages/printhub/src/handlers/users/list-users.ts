import { Request, Response } from "express";
import { z } from "zod";
import { createLogger } from "../../lib/logger/index.js";
import {
  handleException,
  paginationQuery,
  sendError,
} from "../../lib/http/index.js";
import type { DataContext } from "../../domain/data-context.js";
import { listUsers } from "../../domain/user/list-users.js";

const logger = createLogger("printhub:handlers:users:list");

const listUsersQuery = paginationQuery.extend({
  search: z.string().min(1).optional(),
  role: z.enum(["user", "admin"]).optional(),
});

/**
 * GET /api/v1/users - List users with pagination
 */
export function listUsersHandler(ctx: DataContext) {
  return async (req: Request, res: Response): Promise<void> => {
    try {
      const params = listUsersQuery.parse(req.query);
      const result = await listUsers(ctx, params);

      if (!result.success) {
        sendError(res, result.error);
        return;
      }

      res.json(result.data);
    } catch (error) {
      handleException(res, error, logger, "Error listing users");
    }
  };
}
