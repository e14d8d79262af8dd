import { expect } from "chai";
import {
  ADMIN_PASSWORD,
  insertUser,
  loginAs,
  loginAsNewAdmin,
  loginAsNewUser,
} from "@printhub/test-utils";
import type { LoginResult, PaginatedResult, User } from "printhub";
import { client, ctx } from "../test-setup.js";

describe("Auth API", () => {
  describe("POST /api/v1/auth/login", () => {
    it("should return a bearer token and the user", async () => {
      await insertUser(ctx(), "admin", "admin");

      const response = await client.post<LoginResult>("/api/v1/auth/login", {
        username: "admin",
        password: ADMIN_PASSWORD,
      });

      expect(response.status).to.equal(200);
      expect(response.data.tokenType).to.equal("bearer");
      expect(response.data.expiresIn).to.equal(30 * 60);
      expect(response.data.accessToken).to.be.a("string");
      expect(response.data.user.username).to.equal("admin");
      expect(response.data.user.role).to.equal("admin");
      expect(response.data.user).to.not.have.property("hashedPassword");
    });

    it("should accept the email address as login", async () => {
      await insertUser(ctx(), "admin", "admin");

      const response = await client.post<LoginResult>("/api/v1/auth/login", {
        username: "ADMIN@example.com",
        password: ADMIN_PASSWORD,
      });

      expect(response.status).to.equal(200);
      expect(response.data.user.email).to.equal("admin@example.com");
    });

    it("should reject a wrong password with 401", async () => {
      await insertUser(ctx(), "admin", "admin");

      const response = await client.post<{ error: string }>(
        "/api/v1/auth/login",
        { username: "admin", password: "wrong-password" },
      );

      expect(response.status).to.equal(401);
      expect(response.data.error).to.equal("Incorrect username or password");
    });

    it("should accept the urlencoded token form", async () => {
      await insertUser(ctx(), "admin", "admin");

      const response = await client.postRaw<LoginResult>(
        "/api/v1/auth/login/token",
        `username=admin&password=${ADMIN_PASSWORD}`,
        "application/x-www-form-urlencoded",
      );

      expect(response.status).to.equal(200);
      expect(response.data.user.username).to.equal("admin");
    });

    it("should reject malformed JSON with 400", async () => {
      const response = await client.postRaw<{ error: string }>(
        "/api/v1/auth/login",
        "{not json",
        "application/json",
      );

      expect(response.status).to.equal(400);
      expect(response.data.error).to.equal("Invalid JSON in request body");
    });
  });

  describe("GET /api/v1/auth/me", () => {
    it("should return the authenticated user", async () => {
      const admin = await loginAsNewAdmin(ctx(), client);

      const response = await client.get<User>("/api/v1/auth/me");

      expect(response.status).to.equal(200);
      expect(response.data.id).to.equal(admin.id);
      expect(response.data.lastLogin).to.be.a("number");
    });

    it("should return 401 without a token", async () => {
      const response = await client.get<{ error: string }>("/api/v1/auth/me");

      expect(response.status).to.equal(401);
      expect(response.headers["www-authenticate"]).to.equal("Bearer");
    });

    it("should return 401 for a garbage token", async () => {
      client.setToken("not-a-token");

      const response = await client.get("/api/v1/auth/me");

      expect(response.status).to.equal(401);
    });
  });

  describe("POST /api/v1/auth/change-password", () => {
    it("should change the password when the current one matches", async () => {
      await loginAsNewUser(ctx(), client, "customer");

      const response = await client.post("/api/v1/auth/change-password", {
        currentPassword: "user-password",
        newPassword: "another-password",
      });
      expect(response.status).to.equal(204);

      client.clearToken();
      const login = await loginAs(client, "customer", "another-password");
      expect(login.user.username).to.equal("customer");
    });

    it("should reject a wrong current password", async () => {
      await loginAsNewUser(ctx(), client);

      const response = await client.post<{ error: string }>(
        "/api/v1/auth/change-password",
        { currentPassword: "nope", newPassword: "another-password" },
      );

      expect(response.status).to.equal(400);
      expect(response.data.error).to.equal("Incorrect current password");
    });
  });
});

describe("Users API", () => {
  it("should require the admin role", async () => {
    await loginAsNewUser(ctx(), client);

    const response = await client.get<{ error: string }>("/api/v1/users");

    expect(response.status).to.equal(403);
    expect(response.data.error).to.equal("Not enough permissions");
  });

  it("should create, update and delete users", async () => {
    await loginAsNewAdmin(ctx(), client);

    const created = await client.post<User>("/api/v1/users", {
      username: "maker",
      email: "Maker@Example.com",
      password: "maker-password",
      fullName: "Model Maker",
    });
    expect(created.status).to.equal(201);
    expect(created.data.email).to.equal("maker@example.com");
    expect(created.data.role).to.equal("user");
    expect(created.data.isActive).to.equal(true);

    const updated = await client.put<User>(`/api/v1/users/${created.data.id}`, {
      fullName: null,
      isActive: false,
    });
    expect(updated.status).to.equal(200);
    expect(updated.data.fullName).to.equal(undefined);
    expect(updated.data.isActive).to.equal(false);

    const list = await client.get<PaginatedResult<User>>("/api/v1/users");
    expect(list.data.pagination.total).to.equal(2);

    const deleted = await client.delete(`/api/v1/users/${created.data.id}`);
    expect(deleted.status).to.equal(204);

    const missing = await client.get(`/api/v1/users/${created.data.id}`);
    expect(missing.status).to.equal(404);
  });

  it("should reject a duplicate username with 409", async () => {
    await loginAsNewAdmin(ctx(), client);

    const response = await client.post<{ error: string }>("/api/v1/users", {
      username: "admin",
      email: "other@example.com",
      password: "some-password",
    });

    expect(response.status).to.equal(409);
    expect(response.data.error).to.equal("Username already registered");
  });

  it("should not let an admin delete their own account", async () => {
    const admin = await loginAsNewAdmin(ctx(), client);

    const response = await client.delete<{ error: string }>(
      `/api/v1/users/${admin.id}`,
    );

    expect(response.status).to.equal(400);
    expect(response.data.error).to.equal("Cannot delete your own account");
  });

  it("should reject tokens of deactivated users", async () => {
    const admin = await loginAsNewAdmin(ctx(), client);
    await ctx().db("user").where("id", admin.id).update({ is_active: false });

    const response = await client.get("/api/v1/auth/me");

    expect(response.status).to.equal(401);
  });
});
