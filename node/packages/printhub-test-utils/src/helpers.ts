/**
 * Testing helper utilities for PrintHub
 */

import { createUser, type DataContext, type LoginResult, type User } from "printhub";
import type { TestHttpClient } from "./utils/http-client.js";

export { TestDatabase } from "./utils/test-db.js";
export { TestServer, TEST_SECRET } from "./utils/server.js";
export { TestHttpClient } from "./utils/http-client.js";
export { RecordingNotifier } from "./utils/recording-notifier.js";
export type { RecordedNotification } from "./utils/recording-notifier.js";
export {
  testLogger,
  createTestLogger,
  serverLogLevel,
} from "./utils/test-logger.js";
export type { Logger } from "./utils/test-logger.js";
export type { HttpResponse } from "./utils/http-client.js";

export const ADMIN_PASSWORD = "admin-password";
export const USER_PASSWORD = "user-password";

export async function insertUser(
  ctx: DataContext,
  username: string,
  role: "user" | "admin",
): Promise<User> {
  const result = await createUser(ctx, {
    username,
    email: `${username}@example.com`,
    password: role === "admin" ? ADMIN_PASSWORD : USER_PASSWORD,
    role,
  });
  if (!result.success) {
    throw result.error;
  }
  return result.data;
}

/**
 * Log in through the API and attach the token to the client
 */
export async function loginAs(
  client: TestHttpClient,
  username: string,
  password: string,
): Promise<LoginResult> {
  const response = await client.post<LoginResult>("/api/v1/auth/login", {
    username,
    password,
  });
  if (response.status !== 200) {
    throw new Error(`Login failed for ${username}: ${response.status}`);
  }
  client.setToken(response.data.accessToken);
  return response.data;
}

export async function loginAsNewAdmin(
  ctx: DataContext,
  client: TestHttpClient,
  username = "admin",
): Promise<User> {
  const user = await insertUser(ctx, username, "admin");
  await loginAs(client, username, ADMIN_PASSWORD);
  return user;
}

export async function loginAsNewUser(
  ctx: DataContext,
  client: TestHttpClient,
  username = "customer",
): Promise<User> {
  const user = await insertUser(ctx, username, "user");
  await loginAs(client, username, USER_PASSWORD);
  return user;
}
