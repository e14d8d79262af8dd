import {
  Result,
  success,
  failure,
  NotFoundError,
  toError,
} from "../../lib/core/index.js";
import { createLogger } from "../../lib/logger/index.js";
import type { DataContext } from "../data-context.js";

const logger = createLogger("printhub:domain:article");

export async function deleteArticle(
  ctx: DataContext,
  id: string,
): Promise<Result<void, Error>> {
  try {
    const deleted = await ctx.db("article").where("id", id).delete();
    if (deleted === 0) {
      return failure(new NotFoundError("Article", id));
    }
    logger.info("Deleted article", { id });
    return success(undefined);
  } catch (error) {
    logger.error("Failed to delete article", { error, id });
    return failure(toError(error));
  }
}
