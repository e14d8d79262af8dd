import { Request, Response } from "express";
import { z } from "zod";
import { createLogger } from "../../lib/logger/index.js";
import {
  handleException,
  paginationQuery,
  queryBoolean,
  sendError,
} from "../../lib/http/index.js";
import type { DataContext } from "../../domain/data-context.js";
import { listServices } from "../../domain/service/list-services.js";

const logger = createLogger("printhub:handlers:services:list");

const listServicesQuery = paginationQuery.extend({
  activeOnly: queryBoolean.default("true"),
  category: z.string().min(1).optional(),
});

/**
 * GET /api/v1/services - Public service catalogue (cached)
 */
export function listServicesHandler(ctx: DataContext) {
  return async (req: Request, res: Response): Promise<void> => {
    try {
      const params = listServicesQuery.parse(req.query);
      const result = await listServices(ctx, params);

      if (!result.success) {
        sendError(res, result.error);
        return;
      }

      res.json(result.data);
    } catch (error) {
      handleException(res, error, logger, "Error listing services");
    }
  };
}
