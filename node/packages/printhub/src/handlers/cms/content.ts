import { Request, Response } from "express";
import { z } from "zod";
import { createLogger } from "../../lib/logger/index.js";
import {
  handleException,
  paginationQuery,
  queryList,
  sendError,
} from "../../lib/http/index.js";
import type { DataContext } from "../../domain/data-context.js";
import { getContentValues } from "../../domain/cms/content-values.js";
import {
  createContentBlock,
  deleteContentBlock,
  listContentBlocks,
  listContentGroups,
  updateContentBlock,
} from "../../domain/cms/content-blocks.js";

const logger = createLogger("printhub:handlers:cms:content");

const contentTypeSchema = z.enum(["text", "html", "json"]);

const contentKey = z
  .string()
  .min(1)
  .max(255)
  .regex(/^[a-zA-Z0-9_.-]+$/, "Key may contain letters, digits, dot, underscore and dash");

export const createContentBlockSchema = z.object({
  key: contentKey,
  contentType: contentTypeSchema.optional(),
  content: z.string().optional(),
  jsonContent: z.unknown().optional(),
  description: z.string().max(500).optional(),
  groupName: z.string().max(100).optional(),
  isActive: z.boolean().optional(),
  sortOrder: z.number().int().optional(),
});

export const updateContentBlockSchema = z.object({
  key: contentKey.optional(),
  contentType: contentTypeSchema.optional(),
  content: z.string().nullable().optional(),
  jsonContent: z.unknown().optional(),
  description: z.string().max(500).nullable().optional(),
  groupName: z.string().max(100).nullable().optional(),
  isActive: z.boolean().optional(),
  sortOrder: z.number().int().optional(),
});

const byKeysQuery = z.object({ keys: queryList });

const adminListQuery = paginationQuery.extend({
  group: z.string().min(1).optional(),
});

/**
 * GET /api/v1/cms/content/by-keys?keys=a,b
 */
export function contentByKeysHandler(ctx: DataContext) {
  return async (req: Request, res: Response): Promise<void> => {
    try {
      const { keys } = byKeysQuery.parse(req.query);
      const result = await getContentValues(ctx, { keys });

      if (!result.success) {
        sendError(res, result.error);
        return;
      }

      res.json(result.data);
    } catch (error) {
      handleException(res, error, logger, "Error loading content by keys");
    }
  };
}

/**
 * GET /api/v1/cms/content/by-group/:group
 */
export function contentByGroupHandler(ctx: DataContext) {
  return async (
    req: Request<{ group: string }>,
    res: Response,
  ): Promise<void> => {
    try {
      const result = await getContentValues(ctx, { group: req.params.group });

      if (!result.success) {
        sendError(res, result.error);
        return;
      }

      res.json(result.data);
    } catch (error) {
      handleException(res, error, logger, "Error loading content group", {
        group: req.params.group,
      });
    }
  };
}

/**
 * GET /api/v1/cms/admin/content
 */
export function listContentBlocksHandler(ctx: DataContext) {
  return async (req: Request, res: Response): Promise<void> => {
    try {
      const params = adminListQuery.parse(req.query);
      const result = await listContentBlocks(ctx, params);

      if (!result.success) {
        sendError(res, result.error);
        return;
      }

      res.json(result.data);
    } catch (error) {
      handleException(res, error, logger, "Error listing content blocks");
    }
  };
}

/**
 * GET /api/v1/cms/admin/content/groups
 */
export function listContentGroupsHandler(ctx: DataContext) {
  return async (_req: Request, res: Response): Promise<void> => {
    try {
      const result = await listContentGroups(ctx);

      if (!result.success) {
        sendError(res, result.error);
        return;
      }

      res.json(result.data);
    } catch (error) {
      handleException(res, error, logger, "Error listing content groups");
    }
  };
}

/**
 * POST /api/v1/cms/admin/content
 */
export function createContentBlockHandler(ctx: DataContext) {
  return async (req: Request, res: Response): Promise<void> => {
    try {
      const input = createContentBlockSchema.parse(req.body);
      const result = await createContentBlock(ctx, input);

      if (!result.success) {
        sendError(res, result.error);
        return;
      }

      res.status(201).json(result.data);
    } catch (error) {
      handleException(res, error, logger, "Failed to create content block");
    }
  };
}

/**
 * PUT /api/v1/cms/admin/content/:id
 */
export function updateContentBlockHandler(ctx: DataContext) {
  return async (req: Request<{ id: string }>, res: Response): Promise<void> => {
    try {
      const input = updateContentBlockSchema.parse(req.body);
      const result = await updateContentBlock(ctx, req.params.id, input);

      if (!result.success) {
        sendError(res, result.error);
        return;
      }

      res.json(result.data);
    } catch (error) {
      handleException(res, error, logger, "Error updating content block", {
        id: req.params.id,
      });
    }
  };
}

/**
 * DELETE /api/v1/cms/admin/content/:id
 */
export function deleteContentBlockHandler(ctx: DataContext) {
  return async (req: Request<{ id: string }>, res: Response): Promise<void> => {
    try {
      const result = await deleteContentBlock(ctx, req.params.id);

      if (!result.success) {
        sendError(res, result.error);
        return;
      }

      res.status(204).end();
    } catch (error) {
      handleException(res, error, logger, "Error deleting content block", {
        id: req.params.id,
      });
    }
  };
}
