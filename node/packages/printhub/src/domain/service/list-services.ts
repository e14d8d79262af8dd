import { Result, success, failure, toError } from "../../lib/core/index.js";
import { createLogger } from "../../lib/logger/index.js";
import { cached, cacheKey } from "../../lib/cache/index.js";
import {
  countRows,
  whereContains,
  type ServiceDbRow,
} from "../../lib/db/index.js";
import type { DataContext } from "../data-context.js";
import type { PaginatedResult, Service } from "../../types.js";
import { mapServiceFromDb } from "../../mappers.js";

const logger = createLogger("printhub:domain:service");

export const SERVICES_CACHE_PREFIX = "services";

export type ListServicesParams = {
  activeOnly?: boolean;
  category?: string;
  search?: string;
  limit?: number;
  offset?: number;
};

export function listServices(
  ctx: DataContext,
  params: ListServicesParams = {},
): Promise<Result<PaginatedResult<Service>, Error>> {
  const key = cacheKey(`${SERVICES_CACHE_PREFIX}:list`, params);
  return cached(ctx.cache, key, ctx.config.cache.defaultTtlSeconds, () =>
    queryServices(ctx, params),
  );
}

async function queryServices(
  ctx: DataContext,
  params: ListServicesParams,
): Promise<Result<PaginatedResult<Service>, Error>> {
  try {
    const limit = params.limit ?? 100;
    const offset = params.offset ?? 0;

    const query = ctx.db<ServiceDbRow>("service");
    if (params.activeOnly) query.where("is_active", true);
    if (params.category) query.where("category", params.category);
    if (params.search) {
      whereContains(query, ["name", "description"], params.search);
    }

    const total = await countRows(query);
    const rows: ServiceDbRow[] = await query
      .clone()
      .orderBy("name", "asc")
      .limit(limit)
      .offset(offset);

    return success({
      data: rows.map(mapServiceFromDb),
      pagination: { total, limit, offset },
    });
  } catch (error) {
    logger.error("Failed to list services", { error });
    return failure(toError(error));
  }
}
