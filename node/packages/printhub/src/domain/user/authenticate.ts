import {
  Result,
  success,
  failure,
  AuthError,
  toError,
} from "../../lib/core/index.js";
import { createLogger } from "../../lib/logger/index.js";
import { verifyPassword } from "../../lib/auth/password.js";
import { createAccessToken } from "../../lib/auth/tokens.js";
import type { UserDbRow } from "../../lib/db/index.js";
import type { DataContext } from "../data-context.js";
import type { LoginResult } from "../../types.js";
import { mapUserFromDb } from "../../mappers.js";

const logger = createLogger("printhub:domain:user");

/**
 * Check credentials and issue an access token.
 * The login may be either the username or the email address.
 */
export async function authenticate(
  ctx: DataContext,
  login: string,
  password: string,
): Promise<Result<LoginResult, Error>> {
  try {
    const row = await ctx
      .db<UserDbRow>("user")
      .where("username", login)
      .orWhere("email", login.toLowerCase())
      .first();

    if (!row || !(await verifyPassword(password, row.hashed_password))) {
      logger.warn("Failed login attempt", { login });
      return failure(new AuthError("Incorrect username or password"));
    }

    if (!row.is_active) {
      logger.warn("Login attempt for inactive user", { id: row.id });
      return failure(new AuthError("Inactive user"));
    }

    const now = Date.now();
    await ctx.db("user").where("id", row.id).update({ last_login: now });

    const { secretKey, accessTokenExpireMinutes } = ctx.config.auth;
    const accessToken = await createAccessToken(
      { userId: row.id, username: row.username, role: row.role },
      { secretKey, accessTokenExpireMinutes },
    );

    logger.info("User logged in", { id: row.id });
    return success({
      accessToken,
      tokenType: "bearer",
      expiresIn: accessTokenExpireMinutes * 60,
      user: mapUserFromDb({ ...row, last_login: now }),
    });
  } catch (error) {
    logger.error("Failed to authenticate", { error });
    return failure(toError(error));
  }
}
