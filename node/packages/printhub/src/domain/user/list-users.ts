import { Result, success, failure, toError } from "../../lib/core/index.js";
import { createLogger } from "../../lib/logger/index.js";
import { countRows, whereContains, type UserDbRow } from "../../lib/db/index.js";
import type { DataContext } from "../data-context.js";
import type { PaginatedResult, User, UserRole } from "../../types.js";
import { mapUserFromDb } from "../../mappers.js";

const logger = createLogger("printhub:domain:user");

export type ListUsersParams = {
  search?: string;
  role?: UserRole;
  limit?: number;
  offset?: number;
};

export async function listUsers(
  ctx: DataContext,
  params: ListUsersParams = {},
): Promise<Result<PaginatedResult<User>, Error>> {
  try {
    const limit = params.limit ?? 100;
    const offset = params.offset ?? 0;

    const query = ctx.db<UserDbRow>("user");
    if (params.role) query.where("role", params.role);
    if (params.search) {
      whereContains(query, ["username", "email", "full_name"], params.search);
    }

    const total = await countRows(query);
    const rows: UserDbRow[] = await query
      .clone()
      .orderBy("created_at", "desc")
      .limit(limit)
      .offset(offset);

    return success({
      data: rows.map(mapUserFromDb),
      pagination: { total, limit, offset },
    });
  } catch (error) {
    logger.error("Failed to list users", { error });
    return failure(toError(error));
  }
}
