import { Request, Response } from "express";
import { z } from "zod";
import { createLogger } from "../../lib/logger/index.js";
import { handleException, sendError } from "../../lib/http/index.js";
import type { DataContext } from "../../domain/data-context.js";
import {
  createSetting,
  deleteSetting,
  getPublicSettings,
  listSettings,
  updateSetting,
} from "../../domain/settings/site-settings.js";

const logger = createLogger("printhub:handlers:settings");

const valueTypeSchema = z.enum(["text", "json", "boolean", "number"]);

export const createSettingSchema = z.object({
  key: z
    .string()
    .min(1)
    .max(100)
    .regex(/^[a-zA-Z0-9_.-]+$/, "Key may contain letters, digits, dot, underscore and dash"),
  value: z.string().optional(),
  valueType: valueTypeSchema.optional(),
  description: z.string().optional(),
  category: z.string().min(1).max(50).optional(),
  isPublic: z.boolean().optional(),
});

export const updateSettingSchema = z.object({
  value: z.string().nullable().optional(),
  valueType: valueTypeSchema.optional(),
  description: z.string().nullable().optional(),
  category: z.string().min(1).max(50).optional(),
  isPublic: z.boolean().optional(),
});

const listQuery = z.object({
  category: z.string().min(1).optional(),
});

/**
 * GET /api/v1/content/settings/public
 */
export function publicSettingsHandler(ctx: DataContext) {
  return async (_req: Request, res: Response): Promise<void> => {
    try {
      const result = await getPublicSettings(ctx);

      if (!result.success) {
        sendError(res, result.error);
        return;
      }

      res.json(result.data);
    } catch (error) {
      handleException(res, error, logger, "Error loading public settings");
    }
  };
}

/**
 * GET /api/v1/content/admin/settings
 */
export function listSettingsHandler(ctx: DataContext) {
  return async (req: Request, res: Response): Promise<void> => {
    try {
      const { category } = listQuery.parse(req.query);
      const result = await listSettings(ctx, category);

      if (!result.success) {
        sendError(res, result.error);
        return;
      }

      res.json(result.data);
    } catch (error) {
      handleException(res, error, logger, "Error listing settings");
    }
  };
}

/**
 * POST /api/v1/content/admin/settings
 */
export function createSettingHandler(ctx: DataContext) {
  return async (req: Request, res: Response): Promise<void> => {
    try {
      const input = createSettingSchema.parse(req.body);
      const result = await createSetting(ctx, input);

      if (!result.success) {
        sendError(res, result.error);
        return;
      }

      res.status(201).json(result.data);
    } catch (error) {
      handleException(res, error, logger, "Failed to create setting");
    }
  };
}

/**
 * PUT /api/v1/content/admin/settings/:key
 */
export function updateSettingHandler(ctx: DataContext) {
  return async (
    req: Request<{ key: string }>,
    res: Response,
  ): Promise<void> => {
    try {
      const input = updateSettingSchema.parse(req.body);
      const result = await updateSetting(ctx, req.params.key, input);

      if (!result.success) {
        sendError(res, result.error);
        return;
      }

      res.json(result.data);
    } catch (error) {
      handleException(res, error, logger, "Error updating setting", {
        key: req.params.key,
      });
    }
  };
}

/**
 * DELETE /api/v1/content/admin/settings/:key
 */
export function deleteSettingHandler(ctx: DataContext) {
  return async (
    req: Request<{ key: string }>,
    res: Response,
  ): Promise<void> => {
    try {
      const result = await deleteSetting(ctx, req.params.key);

      if (!result.success) {
        sendError(res, result.error);
        return;
      }

      res.status(204).end();
    } catch (error) {
      handleException(res, error, logger, "Error deleting setting", {
        key: req.params.key,
      });
    }
  };
}
