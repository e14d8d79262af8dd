/**
 * HS256 access tokens
 */

import { SignJWT, jwtVerify } from "jose";
import { createLogger } from "../logger/index.js";
import type { UserRole } from "../db/types.js";

const logger = createLogger("printhub:auth:tokens");

export type TokenPayload = {
  userId: string;
  username: string;
  role: UserRole;
};

export type TokenSettings = {
  secretKey: string;
  accessTokenExpireMinutes: number;
};

function secretBytes(secretKey: string): Uint8Array {
  return new TextEncoder().encode(secretKey);
}

export async function createAccessToken(
  payload: TokenPayload,
  settings: TokenSettings,
): Promise<string> {
  return new SignJWT({ username: payload.username, role: payload.role })
    .setProtectedHeader({ alg: "HS256" })
    .setSubject(payload.userId)
    .setIssuedAt()
    .setExpirationTime(`${settings.accessTokenExpireMinutes}m`)
    .sign(secretBytes(settings.secretKey));
}

/**
 * @returns the payload, or null when the token is invalid or expired
 */
export async function verifyAccessToken(
  token: string,
  secretKey: string,
): Promise<TokenPayload | null> {
  try {
    const { payload } = await jwtVerify(token, secretBytes(secretKey), {
      algorithms: ["HS256"],
    });
    const { sub, username, role } = payload;
    if (
      typeof sub !== "string" ||
      typeof username !== "string" ||
      (role !== "user" && role !== "admin")
    ) {
      return null;
    }
    return { userId: sub, username, role };
  } catch (error) {
    logger.debug("Rejected access token", {
      reason: error instanceof Error ? error.message : String(error),
    });
    return null;
  }
}
