import { Result, success, failure, toError } from "../../lib/core/index.js";
import { createLogger } from "../../lib/logger/index.js";
import { cached } from "../../lib/cache/index.js";
import type { ProjectDbRow } from "../../lib/db/index.js";
import type { DataContext } from "../data-context.js";
import type { Project } from "../../types.js";
import { mapProjectFromDb } from "../../mappers.js";
import { PROJECTS_CACHE_PREFIX } from "./list-projects.js";

const logger = createLogger("printhub:domain:project");

export function getProject(
  ctx: DataContext,
  id: string,
): Promise<Result<Project | null, Error>> {
  const key = `${PROJECTS_CACHE_PREFIX}:detail:${id}`;
  return cached(ctx.cache, key, ctx.config.cache.defaultTtlSeconds, async () => {
    try {
      const row = await ctx.db<ProjectDbRow>("project").where("id", id).first();
      return success(row ? mapProjectFromDb(row) : null);
    } catch (error) {
      logger.error("Failed to get project", { error, id });
      return failure(toError(error));
    }
  });
}
