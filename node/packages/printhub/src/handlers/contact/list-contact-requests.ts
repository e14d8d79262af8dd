import { Request, Response } from "express";
import { z } from "zod";
import { createLogger } from "../../lib/logger/index.js";
import {
  handleException,
  paginationQuery,
  sendError,
} from "../../lib/http/index.js";
import type { DataContext } from "../../domain/data-context.js";
import {
  getContactRequest,
  listContactRequests,
  type ListContactRequestsParams,
} from "../../domain/contact/list-contact-requests.js";
import { getContactStats } from "../../domain/contact/contact-stats.js";
import type { ContactStatus } from "../../types.js";

const logger = createLogger("printhub:handlers:contact:list");

export const contactStatusSchema = z.enum([
  "new",
  "in_progress",
  "resolved",
  "closed",
]);

const listQuery = paginationQuery.extend({
  status: contactStatusSchema.optional(),
});

const recentQuery = paginationQuery.extend({
  days: z.coerce.number().int().min(1).max(365).default(7),
});

const DAY_MS = 24 * 60 * 60 * 1000;

const searchQuery = paginationQuery.extend({
  q: z.string().min(1),
});

async function sendList(
  ctx: DataContext,
  res: Response,
  params: ListContactRequestsParams,
): Promise<void> {
  const result = await listContactRequests(ctx, params);
  if (!result.success) {
    sendError(res, result.error);
    return;
  }
  res.json(result.data);
}

/**
 * GET /api/v1/contact/admin
 */
export function listContactRequestsHandler(ctx: DataContext) {
  return async (req: Request, res: Response): Promise<void> => {
    try {
      await sendList(ctx, res, listQuery.parse(req.query));
    } catch (error) {
      handleException(res, error, logger, "Error listing contact requests");
    }
  };
}

/**
 * GET /api/v1/contact/admin/new and /admin/in-progress
 */
export function listContactRequestsWithStatusHandler(
  ctx: DataContext,
  status: ContactStatus,
) {
  return async (req: Request, res: Response): Promise<void> => {
    try {
      const params = paginationQuery.parse(req.query);
      await sendList(ctx, res, { ...params, status });
    } catch (error) {
      handleException(res, error, logger, "Error listing contact requests", {
        status,
      });
    }
  };
}

/**
 * GET /api/v1/contact/admin/recent?days=7
 */
export function listRecentContactRequestsHandler(ctx: DataContext) {
  return async (req: Request, res: Response): Promise<void> => {
    try {
      const { days, ...params } = recentQuery.parse(req.query);
      await sendList(ctx, res, { ...params, since: Date.now() - days * DAY_MS });
    } catch (error) {
      handleException(res, error, logger, "Error listing recent contact requests");
    }
  };
}

/**
 * GET /api/v1/contact/admin/search?q=
 */
export function searchContactRequestsHandler(ctx: DataContext) {
  return async (req: Request, res: Response): Promise<void> => {
    try {
      const { q, ...params } = searchQuery.parse(req.query);
      await sendList(ctx, res, { ...params, search: q });
    } catch (error) {
      handleException(res, error, logger, "Error searching contact requests");
    }
  };
}

/**
 * GET /api/v1/contact/admin/by-email/:email
 */
export function listContactRequestsByEmailHandler(ctx: DataContext) {
  return async (
    req: Request<{ email: string }>,
    res: Response,
  ): Promise<void> => {
    try {
      const params = paginationQuery.parse(req.query);
      await sendList(ctx, res, { ...params, email: req.params.email });
    } catch (error) {
      handleException(res, error, logger, "Error listing contact requests by email");
    }
  };
}

/**
 * GET /api/v1/contact/admin/stats
 */
export function contactStatsHandler(ctx: DataContext) {
  return async (_req: Request, res: Response): Promise<void> => {
    try {
      const result = await getContactStats(ctx);

      if (!result.success) {
        sendError(res, result.error);
        return;
      }

      res.json(result.data);
    } catch (error) {
      handleException(res, error, logger, "Error computing contact stats");
    }
  };
}

/**
 * GET /api/v1/contact/admin/:id
 */
export function getContactRequestHandler(ctx: DataContext) {
  return async (req: Request<{ id: string }>, res: Response): Promise<void> => {
    try {
      const result = await getContactRequest(ctx, req.params.id);

      if (!result.success) {
        sendError(res, result.error);
        return;
      }

      if (!result.data) {
        res.status(404).json({ error: "Contact request not found" });
        return;
      }

      res.json(result.data);
    } catch (error) {
      handleException(res, error, logger, "Failed to get contact request", {
        id: req.params.id,
      });
    }
  };
}
