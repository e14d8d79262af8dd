import { Request, Response } from "express";
import { z } from "zod";
import { createLogger } from "../../lib/logger/index.js";
import {
  handleException,
  queryBoolean,
  sendError,
} from "../../lib/http/index.js";
import type { DataContext } from "../../domain/data-context.js";
import { getColor, listColors } from "../../domain/color/list-colors.js";
import { COLOR_TYPES } from "../../domain/color/color-fields.js";

const logger = createLogger("printhub:handlers:colors:list");

export const colorTypeSchema = z.enum(["solid", "gradient", "metallic"]);

const listColorsQuery = z.object({
  activeOnly: queryBoolean.default("false"),
  type: colorTypeSchema.optional(),
});

const byTypeParams = z.object({ type: colorTypeSchema });

/**
 * GET /api/v1/colors/types
 */
export function listColorTypesHandler() {
  return (_req: Request, res: Response): void => {
    res.json(COLOR_TYPES);
  };
}

/**
 * GET /api/v1/colors
 */
export function listColorsHandler(ctx: DataContext) {
  return async (req: Request, res: Response): Promise<void> => {
    try {
      const params = listColorsQuery.parse(req.query);
      const result = await listColors(ctx, params);

      if (!result.success) {
        sendError(res, result.error);
        return;
      }

      res.json(result.data);
    } catch (error) {
      handleException(res, error, logger, "Error listing colors");
    }
  };
}

/**
 * GET /api/v1/colors/by-type/:type - Active colors of one type
 */
export function listColorsByTypeHandler(ctx: DataContext) {
  return async (
    req: Request<{ type: string }>,
    res: Response,
  ): Promise<void> => {
    try {
      const { type } = byTypeParams.parse(req.params);
      const result = await listColors(ctx, { type, activeOnly: true });

      if (!result.success) {
        sendError(res, result.error);
        return;
      }

      res.json(result.data);
    } catch (error) {
      handleException(res, error, logger, "Error listing colors by type", {
        type: req.params.type,
      });
    }
  };
}

/**
 * GET /api/v1/colors/:id
 */
export function getColorHandler(ctx: DataContext) {
  return async (req: Request<{ id: string }>, res: Response): Promise<void> => {
    try {
      const result = await getColor(ctx, req.params.id);

      if (!result.success) {
        sendError(res, result.error);
        return;
      }

      if (!result.data) {
        res.status(404).json({ error: "Color not found" });
        return;
      }

      res.json(result.data);
    } catch (error) {
      handleException(res, error, logger, "Failed to get color", {
        id: req.params.id,
      });
    }
  };
}
