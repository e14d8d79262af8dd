import type { UserDbRow } from "../../lib/db/index.js";
import type { DataContext } from "../data-context.js";

/**
 * Look for another user holding the given username or email.
 *
 * @returns a conflict message, or null when both are free
 */
export async function findUserConflict(
  ctx: DataContext,
  username: string | undefined,
  email: string | undefined,
  excludeId?: string,
): Promise<string | null> {
  if (username !== undefined) {
    const query = ctx.db<UserDbRow>("user").where("username", username);
    if (excludeId) query.whereNot("id", excludeId);
    if (await query.first()) {
      return "Username already registered";
    }
  }

  if (email !== undefined) {
    const query = ctx.db<UserDbRow>("user").where("email", email.toLowerCase());
    if (excludeId) query.whereNot("id", excludeId);
    if (await query.first()) {
      return "Email already registered";
    }
  }

  return null;
}
