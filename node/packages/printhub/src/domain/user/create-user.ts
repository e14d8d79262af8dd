import { v4 as uuidv4 } from "uuid";
import {
  Result,
  success,
  failure,
  ConflictError,
  toError,
} from "../../lib/core/index.js";
import { createLogger } from "../../lib/logger/index.js";
import { hashPassword } from "../../lib/auth/password.js";
import type { UserDbRow } from "../../lib/db/index.js";
import type { DataContext } from "../data-context.js";
import type { CreateUserInput, User } from "../../types.js";
import { mapUserFromDb } from "../../mappers.js";
import { findUserConflict } from "./find-user-conflict.js";

const logger = createLogger("printhub:domain:user");

/**
 * Create a user account. Username and email must be unique.
 */
export async function createUser(
  ctx: DataContext,
  input: CreateUserInput,
): Promise<Result<User, Error>> {
  try {
    const conflict = await findUserConflict(ctx, input.username, input.email);
    if (conflict) {
      return failure(new ConflictError(conflict));
    }

    const now = Date.now();
    const row: UserDbRow = {
      id: uuidv4(),
      username: input.username,
      email: input.email.toLowerCase(),
      hashed_password: await hashPassword(input.password),
      full_name: input.fullName ?? null,
      is_active: input.isActive ?? true,
      role: input.role ?? "user",
      last_login: null,
      created_at: now,
      updated_at: now,
    };

    await ctx.db("user").insert(row);

    logger.info("Created user", { id: row.id, username: row.username });
    return success(mapUserFromDb(row));
  } catch (error) {
    logger.error("Failed to create user", { error });
    return failure(toError(error));
  }
}
