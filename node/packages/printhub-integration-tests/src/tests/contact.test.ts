import { expect } from "chai";
import { loginAsNewAdmin, loginAsNewUser } from "@printhub/test-utils";
import type { ContactRequest, ContactStats, PaginatedResult } from "printhub";
import { client, ctx } from "../test-setup.js";

const EIGHT_DAYS_MS = 8 * 24 * 60 * 60 * 1000;

describe("Contact API", () => {
  async function submit(body: Record<string, unknown> = {}): Promise<ContactRequest> {
    const response = await client.post<ContactRequest>("/api/v1/contact", {
      name: "Robin",
      email: "robin@example.com",
      subject: "Quote",
      message: "How much for 10 brackets?",
      ...body,
    });
    expect(response.status).to.equal(201);
    return response.data;
  }

  describe("POST /api/v1/contact", () => {
    it("should store a new request", async () => {
      const request = await submit({ phone: "+100200300" });

      expect(request.status).to.equal("new");
      expect(request.phone).to.equal("+100200300");
      expect(request).to.not.have.property("adminNotes");
    });

    it("should validate the email", async () => {
      const response = await client.post<{ error: string }>("/api/v1/contact", {
        name: "Robin",
        email: "not-an-email",
        subject: "Quote",
        message: "Hello",
      });

      expect(response.status).to.equal(400);
      expect(response.data.error).to.equal("Invalid request");
    });
  });

  describe("admin", () => {
    it("should require admin", async () => {
      await loginAsNewUser(ctx(), client);

      const response = await client.get("/api/v1/contact/admin");
      expect(response.status).to.equal(403);
    });

    it("should list and filter by status", async () => {
      const first = await submit({ subject: "First" });
      await submit({ subject: "Second" });
      await loginAsNewAdmin(ctx(), client);

      await client.put(`/api/v1/contact/admin/${first.id}/status`, {
        status: "resolved",
      });

      const all = await client.get<PaginatedResult<ContactRequest>>(
        "/api/v1/contact/admin",
      );
      expect(all.data.pagination).to.deep.equal({ total: 2, limit: 100, offset: 0 });

      const resolved = await client.get<PaginatedResult<ContactRequest>>(
        "/api/v1/contact/admin?status=resolved",
      );
      expect(resolved.data.data.map((r) => r.subject)).to.deep.equal(["First"]);
    });

    it("should search and match emails case-insensitively", async () => {
      await submit({ email: "Casey@Example.com", message: "Resin printing?" });
      await submit();
      await loginAsNewAdmin(ctx(), client);

      const byEmail = await client.get<PaginatedResult<ContactRequest>>(
        "/api/v1/contact/admin/by-email/casey@example.com",
      );
      expect(byEmail.data.data.map((r) => r.email)).to.deep.equal([
        "Casey@Example.com",
      ]);

      const search = await client.get<PaginatedResult<ContactRequest>>(
        "/api/v1/contact/admin/search?q=RESIN",
      );
      expect(search.data.data.map((r) => r.message)).to.deep.equal([
        "Resin printing?",
      ]);
    });

    it("should update notes and fields", async () => {
      const request = await submit();
      await loginAsNewAdmin(ctx(), client);

      const noted = await client.put<ContactRequest>(
        `/api/v1/contact/admin/${request.id}/notes`,
        { adminNotes: "Called back" },
      );
      expect(noted.data.adminNotes).to.equal("Called back");

      const updated = await client.put<ContactRequest>(
        `/api/v1/contact/admin/${request.id}`,
        { status: "in_progress", phone: null, adminNotes: null },
      );
      expect(updated.data.status).to.equal("in_progress");
      expect(updated.data).to.not.have.property("adminNotes");

      const fetched = await client.get<ContactRequest>(
        `/api/v1/contact/admin/${request.id}`,
      );
      expect(fetched.data.status).to.equal("in_progress");
    });

    it("should reject an unknown status", async () => {
      const request = await submit();
      await loginAsNewAdmin(ctx(), client);

      const response = await client.put(
        `/api/v1/contact/admin/${request.id}/status`,
        { status: "archived" },
      );
      expect(response.status).to.equal(400);
    });

    it("should answer 404 for unknown requests", async () => {
      await loginAsNewAdmin(ctx(), client);

      const fetched = await client.get<{ error: string }>(
        "/api/v1/contact/admin/missing-id",
      );
      expect(fetched.status).to.equal(404);
      expect(fetched.data.error).to.equal("Contact request not found");

      const updated = await client.put<{ error: string }>(
        "/api/v1/contact/admin/missing-id/status",
        { status: "closed" },
      );
      expect(updated.data.error).to.equal("Contact request not found: missing-id");
    });

    it("should delete a request", async () => {
      const request = await submit();
      await loginAsNewAdmin(ctx(), client);

      const deleted = await client.delete(`/api/v1/contact/admin/${request.id}`);
      expect(deleted.status).to.equal(204);

      const again = await client.delete(`/api/v1/contact/admin/${request.id}`);
      expect(again.status).to.equal(404);
    });

    it("should list new and in-progress requests", async () => {
      await submit({ subject: "Fresh" });
      const working = await submit({ subject: "Working" });
      const done = await submit({ subject: "Done" });
      await loginAsNewAdmin(ctx(), client);
      await client.put(`/api/v1/contact/admin/${working.id}/status`, {
        status: "in_progress",
      });
      await client.put(`/api/v1/contact/admin/${done.id}/status`, {
        status: "resolved",
      });

      const fresh = await client.get<PaginatedResult<ContactRequest>>(
        "/api/v1/contact/admin/new",
      );
      expect(fresh.data.data.map((r) => r.subject)).to.deep.equal(["Fresh"]);

      const inProgress = await client.get<PaginatedResult<ContactRequest>>(
        "/api/v1/contact/admin/in-progress",
      );
      expect(inProgress.data.data.map((r) => r.subject)).to.deep.equal([
        "Working",
      ]);
    });

    it("should list requests of the last days", async () => {
      const old = await submit({ subject: "Old" });
      await submit({ subject: "Recent" });
      await ctx()
        .db("contact_request")
        .where("id", old.id)
        .update({ created_at: Date.now() - EIGHT_DAYS_MS });
      await loginAsNewAdmin(ctx(), client);

      const week = await client.get<PaginatedResult<ContactRequest>>(
        "/api/v1/contact/admin/recent",
      );
      expect(week.data.data.map((r) => r.subject)).to.deep.equal(["Recent"]);

      const tenDays = await client.get<PaginatedResult<ContactRequest>>(
        "/api/v1/contact/admin/recent?days=10",
      );
      expect(tenDays.data.pagination.total).to.equal(2);

      const invalid = await client.get("/api/v1/contact/admin/recent?days=0");
      expect(invalid.status).to.equal(400);
    });

    it("should count requests by status and recency", async () => {
      const old = await submit();
      const handled = await submit();
      await submit();
      await ctx()
        .db("contact_request")
        .where("id", old.id)
        .update({ created_at: Date.now() - EIGHT_DAYS_MS });

      await loginAsNewAdmin(ctx(), client);
      await client.put(`/api/v1/contact/admin/${handled.id}/status`, {
        status: "closed",
      });

      const response = await client.get<ContactStats>(
        "/api/v1/contact/admin/stats",
      );

      expect(response.data).to.deep.equal({
        totalRequests: 3,
        recentRequests: 2,
        statusDistribution: { new: 2, in_progress: 0, resolved: 0, closed: 1 },
      });
    });
  });
});
