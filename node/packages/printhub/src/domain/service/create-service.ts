import { v4 as uuidv4 } from "uuid";
import { Result, success, failure, toError } from "../../lib/core/index.js";
import { createLogger } from "../../lib/logger/index.js";
import { toJson, type ServiceDbRow } from "../../lib/db/index.js";
import type { DataContext } from "../data-context.js";
import type { CreateServiceInput, Service } from "../../types.js";
import { mapServiceFromDb } from "../../mappers.js";
import { SERVICES_CACHE_PREFIX } from "./list-services.js";

const logger = createLogger("printhub:domain:service");

export async function createService(
  ctx: DataContext,
  input: CreateServiceInput,
): Promise<Result<Service, Error>> {
  try {
    const now = Date.now();
    const row: ServiceDbRow = {
      id: uuidv4(),
      name: input.name,
      description: input.description ?? null,
      category: input.category ?? null,
      features: toJson(input.features ?? []),
      icon: input.icon ?? "cube",
      is_active: input.isActive ?? true,
      created_at: now,
      updated_at: now,
    };

    await ctx.db("service").insert(row);
    await ctx.cache.delPattern(`${SERVICES_CACHE_PREFIX}:*`);

    logger.info("Created service", { id: row.id, name: row.name });
    return success(mapServiceFromDb(row));
  } catch (error) {
    logger.error("Failed to create service", { error });
    return failure(toError(error));
  }
}
