import { expect } from "chai";
import { loginAsNewAdmin, loginAsNewUser } from "@printhub/test-utils";
import type { ContentBlock, Page, PaginatedResult } from "printhub";
import { client, ctx } from "../test-setup.js";

describe("CMS API", () => {
  async function createBlock(body: Record<string, unknown>): Promise<ContentBlock> {
    const response = await client.post<ContentBlock>(
      "/api/v1/cms/admin/content",
      body,
    );
    expect(response.status).to.equal(201);
    return response.data;
  }

  describe("content blocks", () => {
    beforeEach(async () => {
      await loginAsNewAdmin(ctx(), client);
      await createBlock({
        key: "hero.title",
        content: "Print anything",
        groupName: "hero",
        sortOrder: 1,
      });
      await createBlock({
        key: "hero.stats",
        contentType: "json",
        jsonContent: { orders: 1200, rating: 4.9 },
        groupName: "hero",
        sortOrder: 2,
      });
      await createBlock({
        key: "footer.note",
        content: "Hidden",
        groupName: "footer",
        isActive: false,
      });
      client.clearToken();
    });

    it("should map active blocks by key", async () => {
      const response = await client.get<Record<string, unknown>>(
        "/api/v1/cms/content/by-keys?keys=hero.title,hero.stats,footer.note,missing",
      );

      expect(response.status).to.equal(200);
      expect(response.data).to.deep.equal({
        "hero.title": "Print anything",
        "hero.stats": { orders: 1200, rating: 4.9 },
      });
    });

    it("should map a group", async () => {
      const response = await client.get<Record<string, unknown>>(
        "/api/v1/cms/content/by-group/hero",
      );

      expect(Object.keys(response.data)).to.deep.equal(["hero.title", "hero.stats"]);
    });

    it("should see updates after the cache is invalidated", async () => {
      const before = await client.get<Record<string, unknown>>(
        "/api/v1/cms/content/by-group/footer",
      );
      expect(before.data).to.deep.equal({});

      await loginAsNewAdmin(ctx(), client, "editor");
      const list = await client.get<PaginatedResult<ContentBlock>>(
        "/api/v1/cms/admin/content?group=footer",
      );
      const footer = list.data.data[0];
      expect(footer?.key).to.equal("footer.note");

      const updated = await client.put<ContentBlock>(
        `/api/v1/cms/admin/content/${footer?.id ?? ""}`,
        { isActive: true, content: "Shown" },
      );
      expect(updated.data.isActive).to.equal(true);

      const after = await client.get<Record<string, unknown>>(
        "/api/v1/cms/content/by-group/footer",
      );
      expect(after.data).to.deep.equal({ "footer.note": "Shown" });
    });

    it("should list blocks and groups for admins", async () => {
      await loginAsNewAdmin(ctx(), client, "editor");

      const list = await client.get<PaginatedResult<ContentBlock>>(
        "/api/v1/cms/admin/content",
      );
      expect(list.data.data.map((b) => b.key)).to.deep.equal([
        "footer.note",
        "hero.title",
        "hero.stats",
      ]);
      expect(list.data.pagination.total).to.equal(3);

      const groups = await client.get<string[]>("/api/v1/cms/admin/content/groups");
      expect(groups.data).to.deep.equal(["footer", "hero"]);
    });

    it("should reject a duplicate key", async () => {
      await loginAsNewAdmin(ctx(), client, "editor");

      const response = await client.post<{ error: string }>(
        "/api/v1/cms/admin/content",
        { key: "hero.title", content: "Again" },
      );

      expect(response.status).to.equal(409);
      expect(response.data.error).to.equal(
        'Content block with key "hero.title" already exists',
      );
    });

    it("should reject keys with spaces", async () => {
      await loginAsNewAdmin(ctx(), client, "editor");

      const response = await client.post("/api/v1/cms/admin/content", {
        key: "hero title",
      });

      expect(response.status).to.equal(400);
    });

    it("should delete a block", async () => {
      await loginAsNewAdmin(ctx(), client, "editor");
      const block = await createBlock({ key: "temp" });

      const deleted = await client.delete(`/api/v1/cms/admin/content/${block.id}`);
      expect(deleted.status).to.equal(204);

      const again = await client.delete<{ error: string }>(
        `/api/v1/cms/admin/content/${block.id}`,
      );
      expect(again.status).to.equal(404);
      expect(again.data.error).to.equal(`Content block not found: ${block.id}`);
    });

    it("should require admin for management", async () => {
      await loginAsNewUser(ctx(), client);

      const response = await client.get("/api/v1/cms/admin/content");
      expect(response.status).to.equal(403);
    });
  });

  describe("pages", () => {
    it("should create, serve, update and delete a page", async () => {
      await loginAsNewAdmin(ctx(), client);

      const created = await client.post<Page>("/api/v1/cms/admin/pages", {
        slug: "about-us",
        title: "About us",
        content: { sections: ["team", "history"] },
      });
      expect(created.status).to.equal(201);
      expect(created.data.pageType).to.equal("custom");
      expect(created.data.isActive).to.equal(true);

      client.clearToken();
      const served = await client.get<Page>("/api/v1/cms/pages/about-us");
      expect(served.data.content).to.deep.equal({ sections: ["team", "history"] });

      await loginAsNewAdmin(ctx(), client, "editor");
      const hidden = await client.put<Page>(
        `/api/v1/cms/admin/pages/${created.data.id}`,
        { isActive: false, metaTitle: "About" },
      );
      expect(hidden.data.metaTitle).to.equal("About");

      const gone = await client.get<{ error: string }>("/api/v1/cms/pages/about-us");
      expect(gone.status).to.equal(404);
      expect(gone.data.error).to.equal("Page not found");

      const listed = await client.get<Page[]>("/api/v1/cms/admin/pages");
      expect(listed.data.map((p) => p.slug)).to.deep.equal(["about-us"]);

      const deleted = await client.delete(
        `/api/v1/cms/admin/pages/${created.data.id}`,
      );
      expect(deleted.status).to.equal(204);
    });

    it("should reject a duplicate slug", async () => {
      await loginAsNewAdmin(ctx(), client);
      await client.post("/api/v1/cms/admin/pages", { slug: "faq", title: "FAQ" });

      const response = await client.post<{ error: string }>(
        "/api/v1/cms/admin/pages",
        { slug: "faq", title: "FAQ again" },
      );

      expect(response.status).to.equal(409);
      expect(response.data.error).to.equal('Page with slug "faq" already exists');
    });
  });
});
