import { Request, Response } from "express";
import { z } from "zod";
import { createLogger } from "../../lib/logger/index.js";
import { handleException, sendError } from "../../lib/http/index.js";
import type { DataContext } from "../../domain/data-context.js";
import { updateProject } from "../../domain/project/update-project.js";
import { complexityLevelSchema } from "./list-projects.js";

const logger = createLogger("printhub:handlers:projects:update");

const price = z.number().min(0).nullable();

export const updateProjectSchema = z.object({
  title: z.string().min(1).max(200).optional(),
  description: z.string().nullable().optional(),
  category: z.string().min(1).max(50).optional(),
  isFeatured: z.boolean().optional(),
  images: z.array(z.string()).optional(),
  metadata: z.record(z.unknown()).nullable().optional(),
  estimatedPrice: price.optional(),
  estimatedDurationHours: z.number().int().min(0).nullable().optional(),
  complexityLevel: complexityLevelSchema.nullable().optional(),
  priceRangeMin: price.optional(),
  priceRangeMax: price.optional(),
});

/**
 * PUT /api/v1/projects/:id (admin)
 */
export function updateProjectHandler(ctx: DataContext) {
  return async (req: Request<{ id: string }>, res: Response): Promise<void> => {
    try {
      const input = updateProjectSchema.parse(req.body);
      const result = await updateProject(ctx, req.params.id, input);

      if (!result.success) {
        sendError(res, result.error);
        return;
      }

      res.json(result.data);
    } catch (error) {
      handleException(res, error, logger, "Error updating project", {
        id: req.params.id,
      });
    }
  };
}
