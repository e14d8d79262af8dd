import { expect } from "chai";
import { loginAsNewAdmin } from "@printhub/test-utils";
import type { PaginatedResult, Service } from "printhub";
import { client, ctx } from "../test-setup.js";

async function createService(
  body: Record<string, unknown>,
): Promise<Service> {
  const response = await client.post<Service>("/api/v1/services", body);
  expect(response.status).to.equal(201);
  return response.data;
}

describe("Services API", () => {
  beforeEach(async () => {
    await loginAsNewAdmin(ctx(), client);
  });

  describe("POST /api/v1/services", () => {
    it("should create a service with defaults", async () => {
      const service = await createService({ name: "FDM printing" });

      expect(service.name).to.equal("FDM printing");
      expect(service.icon).to.equal("cube");
      expect(service.features).to.deep.equal([]);
      expect(service.isActive).to.equal(true);
    });

    it("should reject a missing name with 400", async () => {
      const response = await client.post<{ error: string }>(
        "/api/v1/services",
        { description: "No name" },
      );

      expect(response.status).to.equal(400);
      expect(response.data.error).to.equal("Invalid request");
    });

    it("should require authentication", async () => {
      client.clearToken();

      const response = await client.post("/api/v1/services", { name: "X" });

      expect(response.status).to.equal(401);
    });
  });

  describe("GET /api/v1/services", () => {
    it("should list active services by name and see new ones after a write", async () => {
      await createService({ name: "SLA printing", features: ["0.05mm layers"] });
      await createService({ name: "Modeling", isActive: false });

      const first = await client.get<PaginatedResult<Service>>(
        "/api/v1/services",
      );
      expect(first.data.data.map((s) => s.name)).to.deep.equal([
        "SLA printing",
      ]);

      await createService({ name: "FDM printing" });

      const second = await client.get<PaginatedResult<Service>>(
        "/api/v1/services",
      );
      expect(second.data.data.map((s) => s.name)).to.deep.equal([
        "FDM printing",
        "SLA printing",
      ]);
      expect(second.data.pagination).to.deep.equal({
        total: 2,
        limit: 100,
        offset: 0,
      });
    });

    it("should include inactive services when activeOnly=false", async () => {
      await createService({ name: "Modeling", isActive: false });

      const response = await client.get<PaginatedResult<Service>>(
        "/api/v1/services?activeOnly=false",
      );

      expect(response.data.pagination.total).to.equal(1);
    });

    it("should search names and descriptions ignoring case", async () => {
      await createService({ name: "Resin printing", description: "High detail" });
      await createService({ name: "Scanning", description: "3D scans of objects" });

      const response = await client.get<PaginatedResult<Service>>(
        "/api/v1/services/search?q=DETAIL",
      );

      expect(response.data.data.map((s) => s.name)).to.deep.equal([
        "Resin printing",
      ]);
    });

    it("should match wildcard characters literally", async () => {
      await createService({ name: "Student 10% off" });
      await createService({ name: "Batch_jobs" });
      await createService({ name: "Regular printing" });

      const percent = await client.get<PaginatedResult<Service>>(
        "/api/v1/services/search?q=%25",
      );
      expect(percent.data.data.map((s) => s.name)).to.deep.equal([
        "Student 10% off",
      ]);

      const underscore = await client.get<PaginatedResult<Service>>(
        "/api/v1/services/search?q=_",
      );
      expect(underscore.data.data.map((s) => s.name)).to.deep.equal([
        "Batch_jobs",
      ]);
    });
  });

  describe("PUT and DELETE /api/v1/services/:id", () => {
    it("should update fields and clear nullable ones", async () => {
      const service = await createService({
        name: "Painting",
        category: "post-processing",
      });

      const response = await client.put<Service>(
        `/api/v1/services/${service.id}`,
        { category: null, features: ["primer", "airbrush"] },
      );

      expect(response.status).to.equal(200);
      expect(response.data.category).to.equal(undefined);
      expect(response.data.features).to.deep.equal(["primer", "airbrush"]);
    });

    it("should deactivate and reactivate", async () => {
      const service = await createService({ name: "Painting" });

      const off = await client.put<Service>(
        `/api/v1/services/${service.id}/deactivate`,
      );
      expect(off.data.isActive).to.equal(false);

      const on = await client.post<Service>(
        `/api/v1/services/${service.id}/activate`,
      );
      expect(on.data.isActive).to.equal(true);
    });

    it("should refuse to delete a service that has orders", async () => {
      const service = await createService({ name: "FDM printing" });
      await client.post("/api/v1/orders", {
        customerName: "Alex",
        customerEmail: "alex@example.com",
        serviceId: service.id,
      });

      const response = await client.delete<{ error: string }>(
        `/api/v1/services/${service.id}`,
      );

      expect(response.status).to.equal(409);
      expect(response.data.error).to.equal(
        "Service has 1 order(s) and cannot be deleted",
      );
    });

    it("should delete an unused service", async () => {
      const service = await createService({ name: "FDM printing" });

      const response = await client.delete(`/api/v1/services/${service.id}`);
      expect(response.status).to.equal(204);

      const missing = await client.get<{ error: string }>(
        `/api/v1/services/${service.id}`,
      );
      expect(missing.status).to.equal(404);
    });

    it("should return 404 when deleting an unknown service", async () => {
      const response = await client.delete<{ error: string }>(
        "/api/v1/services/missing-id",
      );

      expect(response.status).to.equal(404);
      expect(response.data.error).to.equal("Service not found: missing-id");
    });
  });
});
