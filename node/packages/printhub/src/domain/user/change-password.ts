import {
  Result,
  success,
  failure,
  NotFoundError,
  ValidationError,
  toError,
} from "../../lib/core/index.js";
import { createLogger } from "../../lib/logger/index.js";
import { hashPassword, verifyPassword } from "../../lib/auth/password.js";
import type { UserDbRow } from "../../lib/db/index.js";
import type { DataContext } from "../data-context.js";

const logger = createLogger("printhub:domain:user");

export async function changePassword(
  ctx: DataContext,
  userId: string,
  currentPassword: string,
  newPassword: string,
): Promise<Result<void, Error>> {
  try {
    const row = await ctx.db<UserDbRow>("user").where("id", userId).first();
    if (!row) {
      return failure(new NotFoundError("User", userId));
    }

    if (!(await verifyPassword(currentPassword, row.hashed_password))) {
      return failure(new ValidationError("Incorrect current password"));
    }

    await ctx
      .db("user")
      .where("id", userId)
      .update({
        hashed_password: await hashPassword(newPassword),
        updated_at: Date.now(),
      });

    logger.info("Changed password", { id: userId });
    return success(undefined);
  } catch (error) {
    logger.error("Failed to change password", { error, userId });
    return failure(toError(error));
  }
}
