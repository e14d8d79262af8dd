import {
  Result,
  success,
  failure,
  ConflictError,
  NotFoundError,
  toError,
} from "../../lib/core/index.js";
import { createLogger } from "../../lib/logger/index.js";
import { countRows } from "../../lib/db/index.js";
import type { DataContext } from "../data-context.js";
import { SERVICES_CACHE_PREFIX } from "./list-services.js";

const logger = createLogger("printhub:domain:service");

/**
 * Services referenced by orders cannot be deleted; deactivate them instead.
 */
export async function deleteService(
  ctx: DataContext,
  id: string,
): Promise<Result<void, Error>> {
  try {
    const orders = await countRows(ctx.db("order").where("service_id", id));
    if (orders > 0) {
      return failure(
        new ConflictError(`Service has ${orders} order(s) and cannot be deleted`),
      );
    }

    const deleted = await ctx.db("service").where("id", id).delete();
    if (deleted === 0) {
      return failure(new NotFoundError("Service", id));
    }
    await ctx.cache.delPattern(`${SERVICES_CACHE_PREFIX}:*`);

    logger.info("Deleted service", { id });
    return success(undefined);
  } catch (error) {
    logger.error("Failed to delete service", { error, id });
    return failure(toError(error));
  }
}
