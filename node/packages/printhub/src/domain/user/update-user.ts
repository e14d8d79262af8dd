import {
  Result,
  success,
  failure,
  ConflictError,
  NotFoundError,
  toError,
} from "../../lib/core/index.js";
import { createLogger } from "../../lib/logger/index.js";
import { hashPassword } from "../../lib/auth/password.js";
import type { UserDbRow } from "../../lib/db/index.js";
import type { DataContext } from "../data-context.js";
import type { UpdateUserInput, User } from "../../types.js";
import { mapUserFromDb } from "../../mappers.js";
import { findUserConflict } from "./find-user-conflict.js";

const logger = createLogger("printhub:domain:user");

export async function updateUser(
  ctx: DataContext,
  id: string,
  input: UpdateUserInput,
): Promise<Result<User, Error>> {
  try {
    const existing = await ctx.db<UserDbRow>("user").where("id", id).first();
    if (!existing) {
      return failure(new NotFoundError("User", id));
    }

    const conflict = await findUserConflict(ctx, input.username, input.email, id);
    if (conflict) {
      return failure(new ConflictError(conflict));
    }

    const changes: Partial<UserDbRow> = { updated_at: Date.now() };
    if (input.username !== undefined) changes.username = input.username;
    if (input.email !== undefined) changes.email = input.email.toLowerCase();
    if (input.fullName !== undefined) changes.full_name = input.fullName;
    if (input.role !== undefined) changes.role = input.role;
    if (input.isActive !== undefined) changes.is_active = input.isActive;
    if (input.password !== undefined) {
      changes.hashed_password = await hashPassword(input.password);
    }

    await ctx.db("user").where("id", id).update(changes);

    logger.info("Updated user", { id, fields: Object.keys(input) });
    return success(mapUserFromDb({ ...existing, ...changes }));
  } catch (error) {
    logger.error("Failed to update user", { error, id });
    return failure(toError(error));
  }
}
