import { expect } from "chai";
import { loginAsNewAdmin, loginAsNewUser } from "@printhub/test-utils";
import type {
  Order,
  OrderFile,
  OrderWithFiles,
  PaginatedResult,
  Service,
} from "printhub";
import { client, ctx, testServer } from "../test-setup.js";

async function seedService(): Promise<Service> {
  await loginAsNewAdmin(ctx(), client, "shop-admin");
  const response = await client.post<Service>("/api/v1/services", {
    name: "FDM printing",
  });
  client.clearToken();
  return response.data;
}

function stlForm(...names: string[]): FormData {
  const form = new FormData();
  for (const name of names) {
    form.append("files", new Blob(["solid cube\nendsolid cube\n"]), name);
  }
  return form;
}

describe("Orders API", () => {
  let service: Service;

  beforeEach(async () => {
    service = await seedService();
  });

  describe("POST /api/v1/orders", () => {
    it("should place a web order and notify about it", async () => {
      const response = await client.post<Order>("/api/v1/orders", {
        customerName: "Alex",
        customerEmail: "alex@example.com",
        serviceId: service.id,
        specifications: { color: "red", material: "PLA", quantity: 3, infill: 20 },
      });

      expect(response.status).to.equal(201);
      expect(response.data.status).to.equal("new");
      expect(response.data.source).to.equal("web");
      expect(response.data.color).to.equal("red");
      expect(response.data.material).to.equal("PLA");
      expect(response.data.quantity).to.equal(3);
      expect(response.data.infill).to.equal(20);
      expect(response.data).to.not.have.property("totalPrice");

      const sent = testServer.notifier.ofType("new_order");
      expect(sent).to.have.lengthOf(1);
      expect(sent[0]?.data).to.have.property("id", response.data.id);
    });

    it("should use the contact as email when none is given", async () => {
      const response = await client.post<Order>("/api/v1/orders", {
        customerName: "Sam",
        customerContact: "@sam_on_telegram",
        serviceId: service.id,
        source: "telegram",
      });

      expect(response.status).to.equal(201);
      expect(response.data.customerEmail).to.equal("@sam_on_telegram");
      expect(response.data.quantity).to.equal(1);
    });

    it("should require an email or a contact", async () => {
      const response = await client.post<{ error: string }>("/api/v1/orders", {
        customerName: "Sam",
        serviceId: service.id,
      });

      expect(response.status).to.equal(400);
      expect(response.data.error).to.equal(
        "Either customerEmail or customerContact is required",
      );
    });

    it("should reject an unknown service", async () => {
      const response = await client.post<{ error: string }>("/api/v1/orders", {
        customerName: "Sam",
        customerEmail: "sam@example.com",
        serviceId: "missing",
      });

      expect(response.status).to.equal(400);
      expect(response.data.error).to.equal("Service not found");
    });

    it("should link the order to a logged-in customer", async () => {
      const user = await loginAsNewUser(ctx(), client);

      const response = await client.post<Order>("/api/v1/orders", {
        customerName: "Customer",
        customerEmail: "customer@example.com",
        serviceId: service.id,
      });

      expect(response.data.customerId).to.equal(user.id);
    });
  });

  describe("GET /api/v1/orders/search", () => {
    it("should find orders by email ignoring case", async () => {
      await client.post("/api/v1/orders", {
        customerName: "Alex",
        customerEmail: "Alex@Example.com",
        serviceId: service.id,
      });

      const response = await client.get<Order[]>(
        "/api/v1/orders/search?email=alex@example.com",
      );

      expect(response.status).to.equal(200);
      expect(response.data).to.have.lengthOf(1);
      expect(response.data[0]?.customerName).to.equal("Alex");
    });

    it("should reject a value without @", async () => {
      const response = await client.get<{ error: string }>(
        "/api/v1/orders/search?email=alex",
      );

      expect(response.status).to.equal(400);
    });
  });

  describe("admin operations", () => {
    let order: Order;

    beforeEach(async () => {
      const created = await client.post<Order>("/api/v1/orders", {
        customerName: "Sam",
        customerContact: "@sam_on_telegram",
        serviceId: service.id,
        source: "telegram",
      });
      order = created.data;
      await loginAsNewAdmin(ctx(), client);
    });

    it("should not list orders for anonymous callers", async () => {
      client.clearToken();

      const response = await client.get("/api/v1/orders");

      expect(response.status).to.equal(401);
    });

    it("should list orders filtered by status", async () => {
      const all = await client.get<PaginatedResult<Order>>("/api/v1/orders");
      expect(all.data.pagination.total).to.equal(1);

      const done = await client.get<PaginatedResult<Order>>(
        "/api/v1/orders?status=completed",
      );
      expect(done.data.pagination.total).to.equal(0);
    });

    it("should update status and price and notify telegram customers", async () => {
      const response = await client.put<Order>(`/api/v1/orders/${order.id}`, {
        status: "in_progress",
        totalPrice: 42.5,
      });

      expect(response.status).to.equal(200);
      expect(response.data.status).to.equal("in_progress");
      expect(response.data.totalPrice).to.equal(42.5);
      expect(testServer.notifier.ofType("status_change")).to.have.lengthOf(1);
    });

    it("should not notify when the status is unchanged", async () => {
      await client.put(`/api/v1/orders/${order.id}`, { notes: "Call first" });

      expect(testServer.notifier.ofType("status_change")).to.have.lengthOf(0);
    });

    it("should announce a status change without storing it", async () => {
      const response = await client.post<{
        orderId: string;
        newStatus: string;
        userId?: string;
        notified: boolean;
      }>("/api/v1/orders/webhook/status-change", {
        orderId: order.id,
        newStatus: "completed",
        userId: "tg-user-1",
      });

      expect(response.status).to.equal(200);
      expect(response.data).to.deep.equal({
        orderId: order.id,
        newStatus: "completed",
        userId: "tg-user-1",
        notified: true,
      });

      const sent = testServer.notifier.ofType("status_change");
      expect(sent).to.have.lengthOf(1);
      expect(sent[0]?.data).to.include({
        id: order.id,
        status: "completed",
        previousStatus: "new",
      });

      const stored = await client.get<Order>(`/api/v1/orders/${order.id}`);
      expect(stored.data.status).to.equal("new");
    });

    it("should reject status changes for unknown orders or statuses", async () => {
      const missing = await client.post<{ error: string }>(
        "/api/v1/orders/webhook/status-change",
        { orderId: "missing-id", newStatus: "completed" },
      );
      expect(missing.status).to.equal(404);
      expect(missing.data.error).to.equal("Order not found: missing-id");

      const invalid = await client.post<{ error: string }>(
        "/api/v1/orders/webhook/status-change",
        { orderId: order.id, newStatus: "lost" },
      );
      expect(invalid.status).to.equal(400);
      expect(testServer.notifier.ofType("status_change")).to.have.lengthOf(0);
    });

    it("should keep the status change webhook for admins", async () => {
      await loginAsNewUser(ctx(), client);

      const response = await client.post("/api/v1/orders/webhook/status-change", {
        orderId: order.id,
        newStatus: "completed",
      });
      expect(response.status).to.equal(403);
    });

    it("should attach files and return them with the order", async () => {
      const upload = await client.postForm<OrderFile[]>(
        `/api/v1/orders/${order.id}/files`,
        stlForm("cube.stl"),
      );

      expect(upload.status).to.equal(201);
      expect(upload.data).to.have.lengthOf(1);
      expect(upload.data[0]?.originalFilename).to.equal("cube.stl");
      expect(upload.data[0]?.fileType).to.equal("model/stl");
      expect(upload.data[0]?.filePath).to.match(
        new RegExp(`^orders/${order.id}/[0-9a-f-]{36}-cube\\.stl$`),
      );

      const fetched = await client.get<OrderWithFiles>(
        `/api/v1/orders/${order.id}`,
      );
      expect(fetched.data.files.map((f) => f.originalFilename)).to.deep.equal([
        "cube.stl",
      ]);
    });

    it("should reject disallowed file types", async () => {
      const response = await client.postForm<{ error: string }>(
        `/api/v1/orders/${order.id}/files`,
        stlForm("script.sh"),
      );

      expect(response.status).to.equal(400);
      expect(response.data.error).to.match(/^File type \.sh is not allowed/);
    });

    it("should store no files when one of them is rejected", async () => {
      const response = await client.postForm<{ error: string }>(
        `/api/v1/orders/${order.id}/files`,
        stlForm("cube.stl", "script.sh"),
      );

      expect(response.status).to.equal(400);
      expect(await ctx().storage.list(`orders/${order.id}`)).to.deep.equal([]);

      const fetched = await client.get<OrderWithFiles>(`/api/v1/orders/${order.id}`);
      expect(fetched.data.files).to.deep.equal([]);
    });

    it("should delete the order and its stored files", async () => {
      const upload = await client.postForm<OrderFile[]>(
        `/api/v1/orders/${order.id}/files`,
        stlForm("cube.stl"),
      );
      const key = upload.data[0]?.filePath ?? "";

      const response = await client.delete(`/api/v1/orders/${order.id}`);
      expect(response.status).to.equal(204);

      expect(await ctx().storage.info(key)).to.equal(null);
      const missing = await client.get(`/api/v1/orders/${order.id}`);
      expect(missing.status).to.equal(404);
    });
  });
});
