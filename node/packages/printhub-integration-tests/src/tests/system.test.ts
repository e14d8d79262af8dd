import { expect } from "chai";
import { loginAsNewAdmin, loginAsNewUser } from "@printhub/test-utils";
import type { CacheStats } from "printhub";
import { client, ctx, testServer } from "../test-setup.js";

type OpenApiDocument = {
  openapi: string;
  info: { title: string; version: string };
  paths: Record<string, Record<string, { security?: unknown[] }>>;
};

describe("System endpoints", () => {
  describe("health", () => {
    it("should report database and cache status", async () => {
      const response = await client.get<{
        status: string;
        environment: string;
        services: Record<string, string>;
      }>("/health");

      expect(response.status).to.equal(200);
      expect(response.data.status).to.equal("healthy");
      expect(response.data.environment).to.equal("test");
      expect(response.data.services).to.deep.equal({
        database: "connected",
        cache: "connected",
      });
    });

    it("should answer liveness and readiness probes", async () => {
      const live = await client.get("/health/live");
      expect(live.data).to.deep.equal({ status: "alive" });

      const ready = await client.get("/health/ready");
      expect(ready.data).to.deep.equal({ status: "ready" });
    });
  });

  describe("docs", () => {
    it("should publish the OpenAPI document", async () => {
      const response = await client.get<OpenApiDocument>("/openapi.json");

      expect(response.status).to.equal(200);
      expect(response.data.openapi).to.equal("3.0.3");
      expect(response.data.info.version).to.equal("1.0.0");
      expect(response.data.paths).to.have.property("/api/v1/orders/{id}");
      expect(response.data.paths["/api/v1/services"]).to.have.keys(["get", "post"]);
      expect(response.data.paths["/api/v1/services"]?.["post"]?.security).to.deep.equal(
        [{ bearerAuth: [] }],
      );
      expect(response.data.paths["/api/v1/services"]?.["get"]).to.not.have.property(
        "security",
      );
    });

    it("should serve ReDoc outside production", async () => {
      const response = await client.get<string>("/redoc");

      expect(response.status).to.equal(200);
      expect(response.data).to.contain('<redoc spec-url="/openapi.json"></redoc>');
    });
  });

  describe("cache", () => {
    it("should report keys and hits", async () => {
      await loginAsNewAdmin(ctx(), client);
      const before = await client.get<CacheStats>("/api/v1/cache/stats");

      await client.get("/api/v1/projects/categories");
      await client.get("/api/v1/projects/categories");

      const after = await client.get<CacheStats>("/api/v1/cache/stats");
      expect(after.data.enabled).to.equal(true);
      expect(after.data.backend).to.equal("memory");
      expect(after.data.keys).to.equal(1);
      expect(after.data.hits - before.data.hits).to.equal(1);
      expect(after.data.misses - before.data.misses).to.equal(1);
    });

    it("should clear keys by pattern or entirely", async () => {
      await loginAsNewAdmin(ctx(), client);
      await testServer.cache.set("projects:a", 1);
      await testServer.cache.set("projects:b", 2);
      await testServer.cache.set("services:a", 3);

      const byPattern = await client.delete<{ cleared: number }>(
        "/api/v1/cache/clear?pattern=projects:*",
      );
      expect(byPattern.data).to.deep.equal({ cleared: 2 });

      const all = await client.delete<{ cleared: number }>("/api/v1/cache/clear");
      expect(all.data).to.deep.equal({ cleared: 1 });
    });

    it("should list keys matching a pattern", async () => {
      await loginAsNewAdmin(ctx(), client);
      await testServer.cache.set("projects:b", 2);
      await testServer.cache.set("projects:a", 1);
      await testServer.cache.set("services:a", 3);

      const response = await client.get<{
        pattern: string;
        keys: string[];
        count: number;
      }>("/api/v1/cache/keys?pattern=projects:*");

      expect(response.data).to.deep.equal({
        pattern: "projects:*",
        keys: ["projects:a", "projects:b"],
        count: 2,
      });

      const limited = await client.get<{ keys: string[] }>(
        "/api/v1/cache/keys?limit=1",
      );
      expect(limited.data.keys).to.deep.equal(["projects:a"]);
    });

    it("should read and delete a single key", async () => {
      await loginAsNewAdmin(ctx(), client);
      await testServer.cache.set("services:a", { name: "FDM" });

      const read = await client.get<{ key: string; value: unknown }>(
        "/api/v1/cache/key/services:a",
      );
      expect(read.data).to.deep.equal({ key: "services:a", value: { name: "FDM" } });

      const deleted = await client.delete("/api/v1/cache/key/services:a");
      expect(deleted.status).to.equal(204);

      const missing = await client.get<{ error: string }>(
        "/api/v1/cache/key/services:a",
      );
      expect(missing.status).to.equal(404);
      expect(missing.data).to.deep.equal({ error: "Cache key not found" });

      const again = await client.delete("/api/v1/cache/key/services:a");
      expect(again.status).to.equal(404);
    });

    it("should warm up the public listings", async () => {
      await loginAsNewAdmin(ctx(), client);

      const warm = await client.post<{ warmed: string[]; failed: string[] }>(
        "/api/v1/cache/warm-up",
      );
      expect(warm.status).to.equal(200);
      expect(warm.data).to.deep.equal({
        warmed: [
          "services",
          "projects",
          "featuredProjects",
          "projectCategories",
          "publicSettings",
        ],
        failed: [],
      });

      const before = await client.get<CacheStats>("/api/v1/cache/stats");
      await client.get("/api/v1/services");
      const after = await client.get<CacheStats>("/api/v1/cache/stats");

      expect(after.data.hits - before.data.hits).to.equal(1);
      expect(after.data.misses - before.data.misses).to.equal(0);
    });

    it("should require admin", async () => {
      await loginAsNewUser(ctx(), client);

      const response = await client.get("/api/v1/cache/stats");
      expect(response.status).to.equal(403);
    });
  });

  it("should answer 404 for unknown routes", async () => {
    const response = await client.get<{ error: string }>("/api/v1/nothing-here");

    expect(response.status).to.equal(404);
    expect(response.data).to.deep.equal({ error: "Not found" });
  });
});
