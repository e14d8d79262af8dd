import {
  Result,
  success,
  failure,
  NotFoundError,
  toError,
} from "../../lib/core/index.js";
import { createLogger } from "../../lib/logger/index.js";
import type { DataContext } from "../data-context.js";

const logger = createLogger("printhub:domain:review");

export async function deleteReview(
  ctx: DataContext,
  id: string,
): Promise<Result<void, Error>> {
  try {
    const deleted = await ctx.db("review").where("id", id).delete();
    if (deleted === 0) {
      return failure(new NotFoundError("Review", id));
    }
    logger.info("Deleted review", { id });
    return success(undefined);
  } catch (error) {
    logger.error("Failed to delete review", { error, id });
    return failure(toError(error));
  }
}
