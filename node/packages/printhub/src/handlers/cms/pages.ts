import { Request, Response } from "express";
import { z } from "zod";
import { createLogger } from "../../lib/logger/index.js";
import { handleException, sendError } from "../../lib/http/index.js";
import type { DataContext } from "../../domain/data-context.js";
import {
  createPage,
  deletePage,
  getPageBySlug,
  listPages,
  updatePage,
} from "../../domain/cms/pages.js";
import { slugSchema } from "../categories/create-category.js";

const logger = createLogger("printhub:handlers:cms:pages");

export const createPageSchema = z.object({
  slug: slugSchema,
  title: z.string().min(1).max(255),
  metaTitle: z.string().max(255).optional(),
  metaDescription: z.string().optional(),
  content: z.record(z.unknown()).optional(),
  pageType: z.string().min(1).max(50).optional(),
  isActive: z.boolean().optional(),
});

export const updatePageSchema = z.object({
  slug: slugSchema.optional(),
  title: z.string().min(1).max(255).optional(),
  metaTitle: z.string().max(255).nullable().optional(),
  metaDescription: z.string().nullable().optional(),
  content: z.record(z.unknown()).nullable().optional(),
  pageType: z.string().min(1).max(50).optional(),
  isActive: z.boolean().optional(),
});

/**
 * GET /api/v1/cms/pages/:slug - Active pages only
 */
export function getPageHandler(ctx: DataContext) {
  return async (
    req: Request<{ slug: string }>,
    res: Response,
  ): Promise<void> => {
    try {
      const result = await getPageBySlug(ctx, req.params.slug, true);

      if (!result.success) {
        sendError(res, result.error);
        return;
      }

      if (!result.data) {
        res.status(404).json({ error: "Page not found" });
        return;
      }

      res.json(result.data);
    } catch (error) {
      handleException(res, error, logger, "Failed to get page", {
        slug: req.params.slug,
      });
    }
  };
}

/**
 * GET /api/v1/cms/admin/pages
 */
export function listPagesHandler(ctx: DataContext) {
  return async (_req: Request, res: Response): Promise<void> => {
    try {
      const result = await listPages(ctx);

      if (!result.success) {
        sendError(res, result.error);
        return;
      }

      res.json(result.data);
    } catch (error) {
      handleException(res, error, logger, "Error listing pages");
    }
  };
}

/**
 * POST /api/v1/cms/admin/pages
 */
export function createPageHandler(ctx: DataContext) {
  return async (req: Request, res: Response): Promise<void> => {
    try {
      const input = createPageSchema.parse(req.body);
      const result = await createPage(ctx, input);

      if (!result.success) {
        sendError(res, result.error);
        return;
      }

      res.status(201).json(result.data);
    } catch (error) {
      handleException(res, error, logger, "Failed to create page");
    }
  };
}

/**
 * PUT /api/v1/cms/admin/pages/:id
 */
export function updatePageHandler(ctx: DataContext) {
  return async (req: Request<{ id: string }>, res: Response): Promise<void> => {
    try {
      const input = updatePageSchema.parse(req.body);
      const result = await updatePage(ctx, req.params.id, input);

      if (!result.success) {
        sendError(res, result.error);
        return;
      }

      res.json(result.data);
    } catch (error) {
      handleException(res, error, logger, "Error updating page", {
        id: req.params.id,
      });
    }
  };
}

/**
 * DELETE /api/v1/cms/admin/pages/:id
 */
export function deletePageHandler(ctx: DataContext) {
  return async (req: Request<{ id: string }>, res: Response): Promise<void> => {
    try {
      const result = await deletePage(ctx, req.params.id);

      if (!result.success) {
        sendError(res, result.error);
        return;
      }

      res.status(204).end();
    } catch (error) {
      handleException(res, error, logger, "Error deleting page", {
        id: req.params.id,
      });
    }
  };
}
