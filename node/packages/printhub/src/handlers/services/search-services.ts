import { Request, Response } from "express";
import { z } from "zod";
import { createLogger } from "../../lib/logger/index.js";
import {
  handleException,
  paginationQuery,
  sendError,
} from "../../lib/http/index.js";
import type { DataContext } from "../../domain/data-context.js";
import { listServices } from "../../domain/service/list-services.js";

const logger = createLogger("printhub:handlers:services:search");

const searchServicesQuery = paginationQuery.extend({
  q: z.string().min(1),
});

/**
 * GET /api/v1/services/search?q= - Active services matching name or description
 */
export function searchServicesHandler(ctx: DataContext) {
  return async (req: Request, res: Response): Promise<void> => {
    try {
      const { q, limit, offset } = searchServicesQuery.parse(req.query);
      const result = await listServices(ctx, {
        search: q,
        activeOnly: true,
        limit,
        offset,
      });

      if (!result.success) {
        sendError(res, result.error);
        return;
      }

      res.json(result.data);
    } catch (error) {
      handleException(res, error, logger, "Error searching services");
    }
  };
}
