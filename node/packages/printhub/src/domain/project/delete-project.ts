import {
  Result,
  success,
  failure,
  NotFoundError,
  toError,
} from "../../lib/core/index.js";
import { createLogger } from "../../lib/logger/index.js";
import type { ProjectDbRow } from "../../lib/db/index.js";
import type { DataContext } from "../data-context.js";
import { PROJECTS_CACHE_PREFIX } from "./list-projects.js";

const logger = createLogger("printhub:domain:project");

/**
 * Delete a project and its stored STL file
 */
export async function deleteProject(
  ctx: DataContext,
  id: string,
): Promise<Result<void, Error>> {
  try {
    const existing = await ctx
      .db<ProjectDbRow>("project")
      .where("id", id)
      .first();
    if (!existing) {
      return failure(new NotFoundError("Project", id));
    }

    await ctx.db("project").where("id", id).delete();
    await ctx.cache.delPattern(`${PROJECTS_CACHE_PREFIX}:*`);

    if (existing.stl_file) {
      await ctx.storage.delete(existing.stl_file).catch((error: unknown) => {
        logger.warn("Failed to delete project STL file", {
          id,
          key: existing.stl_file,
          error,
        });
      });
    }

    logger.info("Deleted project", { id });
    return success(undefined);
  } catch (error) {
    logger.error("Failed to delete project", { error, id });
    return failure(toError(error));
  }
}
