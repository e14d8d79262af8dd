import {
  Result,
  success,
  failure,
  NotFoundError,
  toError,
} from "../../lib/core/index.js";
import { createLogger } from "../../lib/logger/index.js";
import type { DataContext } from "../data-context.js";

const logger = createLogger("printhub:domain:user");

export async function deleteUser(
  ctx: DataContext,
  id: string,
): Promise<Result<void, Error>> {
  try {
    const deleted = await ctx.db("user").where("id", id).delete();
    if (deleted === 0) {
      return failure(new NotFoundError("User", id));
    }
    logger.info("Deleted user", { id });
    return success(undefined);
  } catch (error) {
    logger.error("Failed to delete user", { error, id });
    return failure(toError(error));
  }
}
