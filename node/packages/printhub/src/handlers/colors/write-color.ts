import { Request, Response } from "express";
import { z } from "zod";
import { createLogger } from "../../lib/logger/index.js";
import { handleException, sendError } from "../../lib/http/index.js";
import type { DataContext } from "../../domain/data-context.js";
import { createColor } from "../../domain/color/create-color.js";
import {
  toggleColorFlag,
  updateColor,
  type ColorFlag,
} from "../../domain/color/update-color.js";
import { deleteColor } from "../../domain/color/delete-color.js";
import { HEX_COLOR_REGEX } from "../../domain/color/color-fields.js";
import { colorTypeSchema } from "./list-colors.js";

const logger = createLogger("printhub:handlers:colors:write");

const hexColor = z
  .string()
  .regex(HEX_COLOR_REGEX, "Color must be in #RRGGBB format");

const gradientStopSchema = z.object({
  color: hexColor,
  position: z.number().min(0).max(100),
});

const colorFields = {
  type: colorTypeSchema.optional(),
  isActive: z.boolean().optional(),
  isNew: z.boolean().optional(),
  sortOrder: z.number().int().optional(),
  priceModifier: z.number().positive().optional(),
  hexCode: hexColor.nullable().optional(),
  gradientColors: z.array(gradientStopSchema).nullable().optional(),
  gradientDirection: z.enum(["linear", "radial"]).nullable().optional(),
  metallicBase: hexColor.nullable().optional(),
  metallicIntensity: z.number().min(0).max(1).nullable().optional(),
};

export const createColorSchema = z.object({
  name: z.string().min(1).max(100),
  ...colorFields,
});

export const updateColorSchema = z.object({
  name: z.string().min(1).max(100).optional(),
  ...colorFields,
});

/**
 * POST /api/v1/colors (admin)
 */
export function createColorHandler(ctx: DataContext) {
  return async (req: Request, res: Response): Promise<void> => {
    try {
      const input = createColorSchema.parse(req.body);
      const result = await createColor(ctx, input);

      if (!result.success) {
        sendError(res, result.error);
        return;
      }

      res.status(201).json(result.data);
    } catch (error) {
      handleException(res, error, logger, "Failed to create color");
    }
  };
}

/**
 * PUT /api/v1/colors/:id (admin)
 */
export function updateColorHandler(ctx: DataContext) {
  return async (req: Request<{ id: string }>, res: Response): Promise<void> => {
    try {
      const input = updateColorSchema.parse(req.body);
      const result = await updateColor(ctx, req.params.id, input);

      if (!result.success) {
        sendError(res, result.error);
        return;
      }

      res.json(result.data);
    } catch (error) {
      handleException(res, error, logger, "Error updating color", {
        id: req.params.id,
      });
    }
  };
}

/**
 * PATCH /api/v1/colors/:id/toggle-active and /toggle-new (admin)
 */
export function toggleColorFlagHandler(ctx: DataContext, flag: ColorFlag) {
  return async (req: Request<{ id: string }>, res: Response): Promise<void> => {
    try {
      const result = await toggleColorFlag(ctx, req.params.id, flag);

      if (!result.success) {
        sendError(res, result.error);
        return;
      }

      res.json(result.data);
    } catch (error) {
      handleException(res, error, logger, "Error toggling color flag", {
        id: req.params.id,
        flag,
      });
    }
  };
}

/**
 * DELETE /api/v1/colors/:id (admin)
 */
export function deleteColorHandler(ctx: DataContext) {
  return async (req: Request<{ id: string }>, res: Response): Promise<void> => {
    try {
      const result = await deleteColor(ctx, req.params.id);

      if (!result.success) {
        sendError(res, result.error);
        return;
      }

      res.status(204).end();
    } catch (error) {
      handleException(res, error, logger, "Error deleting color", {
        id: req.params.id,
      });
    }
  };
}
