import type { Knex } from "knex";
import { Result, success, failure, toError } from "../../lib/core/index.js";
import { createLogger } from "../../lib/logger/index.js";
import { cached, cacheKey } from "../../lib/cache/index.js";
import {
  countRows,
  whereContains,
  type ProjectDbRow,
} from "../../lib/db/index.js";
import type { DataContext } from "../data-context.js";
import type {
  ListProjectsParams,
  PagedResult,
  Project,
} from "../../types.js";
import { mapProjectFromDb } from "../../mappers.js";

const logger = createLogger("printhub:domain:project");

export const PROJECTS_CACHE_PREFIX = "projects";

function applyFilters(query: Knex.QueryBuilder, params: ListProjectsParams): void {
  if (params.category) query.where("category", params.category);
  if (params.isFeatured !== undefined) {
    query.where("is_featured", params.isFeatured);
  }
  if (params.search) {
    whereContains(query, ["title", "description"], params.search);
  }
  if (params.complexityLevels && params.complexityLevels.length > 0) {
    query.whereIn("complexity_level", params.complexityLevels);
  }

  // A project's price is its estimate, or its range when no estimate is set
  const { minPrice, maxPrice } = params;
  if (minPrice !== undefined) {
    query.where((builder) => {
      builder
        .where("estimated_price", ">=", minPrice)
        .orWhere((range) => {
          range
            .whereNull("estimated_price")
            .where("price_range_max", ">=", minPrice);
        });
    });
  }
  if (maxPrice !== undefined) {
    query.where((builder) => {
      builder
        .where("estimated_price", "<=", maxPrice)
        .orWhere((range) => {
          range
            .whereNull("estimated_price")
            .where("price_range_min", "<=", maxPrice);
        });
    });
  }

  if (params.minHours !== undefined) {
    query.where("estimated_duration_hours", ">=", params.minHours);
  }
  if (params.maxHours !== undefined) {
    query.where("estimated_duration_hours", "<=", params.maxHours);
  }
}

/**
 * Page through the portfolio, featured projects first, newest first
 */
export function listProjects(
  ctx: DataContext,
  params: ListProjectsParams,
): Promise<Result<PagedResult<Project>, Error>> {
  const key = cacheKey(`${PROJECTS_CACHE_PREFIX}:list`, params);
  return cached(ctx.cache, key, ctx.config.cache.defaultTtlSeconds, async () => {
    try {
      const query = ctx.db<ProjectDbRow>("project");
      applyFilters(query, params);

      const total = await countRows(query);
      const rows: ProjectDbRow[] = await query
        .clone()
        .orderBy([
          { column: "is_featured", order: "desc" },
          { column: "created_at", order: "desc" },
        ])
        .limit(params.perPage)
        .offset((params.page - 1) * params.perPage);

      const pages = Math.ceil(total / params.perPage);
      return success({
        data: rows.map(mapProjectFromDb),
        pagination: {
          page: params.page,
          perPage: params.perPage,
          total,
          pages,
          hasNext: params.page < pages,
          hasPrev: params.page > 1,
        },
      });
    } catch (error) {
      logger.error("Failed to list projects", { error });
      return failure(toError(error));
    }
  });
}

export function listFeaturedProjects(
  ctx: DataContext,
  limit: number,
): Promise<Result<Project[], Error>> {
  const key = cacheKey(`${PROJECTS_CACHE_PREFIX}:featured`, { limit });
  return cached(ctx.cache, key, ctx.config.cache.defaultTtlSeconds, async () => {
    try {
      const rows = await ctx
        .db<ProjectDbRow>("project")
        .where("is_featured", true)
        .orderBy("created_at", "desc")
        .limit(limit);
      return success(rows.map(mapProjectFromDb));
    } catch (error) {
      logger.error("Failed to list featured projects", { error });
      return failure(toError(error));
    }
  });
}

/**
 * Distinct project categories in use, sorted
 */
export function listProjectCategories(
  ctx: DataContext,
): Promise<Result<string[], Error>> {
  const key = `${PROJECTS_CACHE_PREFIX}:categories`;
  return cached(ctx.cache, key, ctx.config.cache.defaultTtlSeconds, async () => {
    try {
      const rows = await ctx
        .db<ProjectDbRow>("project")
        .distinct("category")
        .orderBy("category", "asc");
      return success(rows.map((row) => row.category));
    } catch (error) {
      logger.error("Failed to list project categories", { error });
      return failure(toError(error));
    }
  });
}
