import { v4 as uuidv4 } from "uuid";
import { Result, success, failure, toError } from "../../lib/core/index.js";
import { createLogger } from "../../lib/logger/index.js";
import { toJson, type ProjectDbRow } from "../../lib/db/index.js";
import type { DataContext } from "../data-context.js";
import type { CreateProjectInput, Project } from "../../types.js";
import { mapProjectFromDb } from "../../mappers.js";
import { PROJECTS_CACHE_PREFIX } from "./list-projects.js";

const logger = createLogger("printhub:domain:project");

export async function createProject(
  ctx: DataContext,
  input: CreateProjectInput,
): Promise<Result<Project, Error>> {
  try {
    const now = Date.now();
    const row: ProjectDbRow = {
      id: uuidv4(),
      title: input.title,
      description: input.description ?? null,
      category: input.category,
      stl_file: null,
      is_featured: input.isFeatured ?? false,
      images: toJson(input.images ?? []),
      metadata: toJson(input.metadata),
      estimated_price: input.estimatedPrice ?? null,
      estimated_duration_hours: input.estimatedDurationHours ?? null,
      complexity_level: input.complexityLevel ?? null,
      price_range_min: input.priceRangeMin ?? null,
      price_range_max: input.priceRangeMax ?? null,
      created_at: now,
      updated_at: now,
    };

    await ctx.db("project").insert(row);
    await ctx.cache.delPattern(`${PROJECTS_CACHE_PREFIX}:*`);

    logger.info("Created project", { id: row.id, title: row.title });
    return success(mapProjectFromDb(row));
  } catch (error) {
    logger.error("Failed to create project", { error });
    return failure(toError(error));
  }
}
