import { Request, Response } from "express";
import { z } from "zod";
import { createLogger } from "../../lib/logger/index.js";
import { handleException, sendError } from "../../lib/http/index.js";
import type { DataContext } from "../../domain/data-context.js";
import { createProject } from "../../domain/project/create-project.js";
import { complexityLevelSchema } from "./list-projects.js";

const logger = createLogger("printhub:handlers:projects:create");

const price = z.number().min(0);

export const createProjectSchema = z
  .object({
    title: z.string().min(1).max(200),
    description: z.string().optional(),
    category: z.string().min(1).max(50),
    isFeatured: z.boolean().optional(),
    images: z.array(z.string()).optional(),
    metadata: z.record(z.unknown()).optional(),
    estimatedPrice: price.optional(),
    estimatedDurationHours: z.number().int().min(0).optional(),
    complexityLevel: complexityLevelSchema.optional(),
    priceRangeMin: price.optional(),
    priceRangeMax: price.optional(),
  })
  .refine(
    (project) =>
      project.priceRangeMin === undefined ||
      project.priceRangeMax === undefined ||
      project.priceRangeMin <= project.priceRangeMax,
    {
      message: "priceRangeMin must not exceed priceRangeMax",
      path: ["priceRangeMin"],
    },
  );

/**
 * POST /api/v1/projects (admin)
 */
export function createProjectHandler(ctx: DataContext) {
  return async (req: Request, res: Response): Promise<void> => {
    try {
      const input = createProjectSchema.parse(req.body);
      const result = await createProject(ctx, input);

      if (!result.success) {
        sendError(res, result.error);
        return;
      }

      res.status(201).json(result.data);
    } catch (error) {
      handleException(res, error, logger, "Failed to create project");
    }
  };
}
