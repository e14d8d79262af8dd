import {
  Result,
  success,
  failure,
  NotFoundError,
  toError,
} from "../../lib/core/index.js";
import { createLogger } from "../../lib/logger/index.js";
import { toJson, type ServiceDbRow } from "../../lib/db/index.js";
import type { DataContext } from "../data-context.js";
import type { Service, UpdateServiceInput } from "../../types.js";
import { mapServiceFromDb } from "../../mappers.js";
import { SERVICES_CACHE_PREFIX } from "./list-services.js";

const logger = createLogger("printhub:domain:service");

export async function updateService(
  ctx: DataContext,
  id: string,
  input: UpdateServiceInput,
): Promise<Result<Service, Error>> {
  try {
    const existing = await ctx
      .db<ServiceDbRow>("service")
      .where("id", id)
      .first();
    if (!existing) {
      return failure(new NotFoundError("Service", id));
    }

    const changes: Partial<ServiceDbRow> = { updated_at: Date.now() };
    if (input.name !== undefined) changes.name = input.name;
    if (input.description !== undefined) changes.description = input.description;
    if (input.category !== undefined) changes.category = input.category;
    if (input.features !== undefined) changes.features = toJson(input.features);
    if (input.icon !== undefined) changes.icon = input.icon;
    if (input.isActive !== undefined) changes.is_active = input.isActive;

    await ctx.db("service").where("id", id).update(changes);
    await ctx.cache.delPattern(`${SERVICES_CACHE_PREFIX}:*`);

    logger.info("Updated service", { id });
    return success(mapServiceFromDb({ ...existing, ...changes }));
  } catch (error) {
    logger.error("Failed to update service", { error, id });
    return failure(toError(error));
  }
}

export function setServiceActive(
  ctx: DataContext,
  id: string,
  isActive: boolean,
): Promise<Result<Service, Error>> {
  return updateService(ctx, id, { isActive });
}
