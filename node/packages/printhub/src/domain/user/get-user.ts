import { Result, success, failure, toError } from "../../lib/core/index.js";
import { createLogger } from "../../lib/logger/index.js";
import type { UserDbRow } from "../../lib/db/index.js";
import type { DataContext } from "../data-context.js";
import type { User } from "../../types.js";
import { mapUserFromDb } from "../../mappers.js";

const logger = createLogger("printhub:domain:user");

/**
 * Get a user by ID
 *
 * @returns the user, or null when no such user exists
 */
export async function getUser(
  ctx: DataContext,
  id: string,
): Promise<Result<User | null, Error>> {
  try {
    const row = await ctx.db<UserDbRow>("user").where("id", id).first();
    if (!row) {
      logger.debug("User not found", { id });
      return success(null);
    }
    return success(mapUserFromDb(row));
  } catch (error) {
    logger.error("Failed to get user", { error, id });
    return failure(toError(error));
  }
}
