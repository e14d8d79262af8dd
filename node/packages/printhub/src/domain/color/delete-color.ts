import {
  Result,
  success,
  failure,
  NotFoundError,
  toError,
} from "../../lib/core/index.js";
import { createLogger } from "../../lib/logger/index.js";
import type { DataContext } from "../data-context.js";

const logger = createLogger("printhub:domain:color");

export async function deleteColor(
  ctx: DataContext,
  id: string,
): Promise<Result<void, Error>> {
  try {
    const deleted = await ctx.db("color").where("id", id).delete();
    if (deleted === 0) {
      return failure(new NotFoundError("Color", id));
    }
    logger.info("Deleted color", { id });
    return success(undefined);
  } catch (error) {
    logger.error("Failed to delete color", { error, id });
    return failure(toError(error));
  }
}
