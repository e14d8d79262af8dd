import { Result, success, failure, toError } from "../../lib/core/index.js";
import { createLogger } from "../../lib/logger/index.js";
import type { ServiceDbRow } from "../../lib/db/index.js";
import type { DataContext } from "../data-context.js";
import type { Service } from "../../types.js";
import { mapServiceFromDb } from "../../mappers.js";

const logger = createLogger("printhub:domain:service");

export async function getService(
  ctx: DataContext,
  id: string,
): Promise<Result<Service | null, Error>> {
  try {
    const row = await ctx.db<ServiceDbRow>("service").where("id", id).first();
    return success(row ? mapServiceFromDb(row) : null);
  } catch (error) {
    logger.error("Failed to get service", { error, id });
    return failure(toError(error));
  }
}
