import {
  Result,
  success,
  failure,
  NotFoundError,
  toError,
} from "../../lib/core/index.js";
import { createLogger } from "../../lib/logger/index.js";
import { toJson, type ProjectDbRow } from "../../lib/db/index.js";
import type { DataContext } from "../data-context.js";
import type { Project, UpdateProjectInput } from "../../types.js";
import { mapProjectFromDb } from "../../mappers.js";
import { PROJECTS_CACHE_PREFIX } from "./list-projects.js";

const logger = createLogger("printhub:domain:project");

export async function updateProject(
  ctx: DataContext,
  id: string,
  input: UpdateProjectInput,
): Promise<Result<Project, Error>> {
  try {
    const existing = await ctx
      .db<ProjectDbRow>("project")
      .where("id", id)
      .first();
    if (!existing) {
      return failure(new NotFoundError("Project", id));
    }

    const changes: Partial<ProjectDbRow> = { updated_at: Date.now() };
    if (input.title !== undefined) changes.title = input.title;
    if (input.description !== undefined) changes.description = input.description;
    if (input.category !== undefined) changes.category = input.category;
    if (input.stlFile !== undefined) changes.stl_file = input.stlFile;
    if (input.isFeatured !== undefined) changes.is_featured = input.isFeatured;
    if (input.images !== undefined) changes.images = toJson(input.images);
    if (input.metadata !== undefined) changes.metadata = toJson(input.metadata);
    if (input.estimatedPrice !== undefined) {
      changes.estimated_price = input.estimatedPrice;
    }
    if (input.estimatedDurationHours !== undefined) {
      changes.estimated_duration_hours = input.estimatedDurationHours;
    }
    if (input.complexityLevel !== undefined) {
      changes.complexity_level = input.complexityLevel;
    }
    if (input.priceRangeMin !== undefined) {
      changes.price_range_min = input.priceRangeMin;
    }
    if (input.priceRangeMax !== undefined) {
      changes.price_range_max = input.priceRangeMax;
    }

    await ctx.db("project").where("id", id).update(changes);
    await ctx.cache.delPattern(`${PROJECTS_CACHE_PREFIX}:*`);

    logger.info("Updated project", { id });
    return success(mapProjectFromDb({ ...existing, ...changes }));
  } catch (error) {
    logger.error("Failed to update project", { error, id });
    return failure(toError(error));
  }
}
