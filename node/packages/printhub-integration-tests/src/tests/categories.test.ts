import { expect } from "chai";
import { loginAsNewAdmin } from "@printhub/test-utils";
import type { Category, PaginatedResult } from "printhub";
import { client, ctx } from "../test-setup.js";

async function createCategory(
  body: Record<string, unknown>,
): Promise<Category> {
  const response = await client.post<Category>("/api/v1/categories", body);
  expect(response.status).to.equal(201);
  return response.data;
}

describe("Categories API", () => {
  beforeEach(async () => {
    await loginAsNewAdmin(ctx(), client);
  });

  it("should derive the slug from the name", async () => {
    const category = await createCategory({
      name: "Miniatures & Figures",
      type: "project",
    });

    expect(category.slug).to.equal("miniatures-figures");
    expect(category.isActive).to.equal(true);
  });

  it("should reject a duplicate name", async () => {
    await createCategory({ name: "Tools", type: "project" });

    const response = await client.post<{ error: string }>(
      "/api/v1/categories",
      { name: "Tools", type: "article" },
    );

    expect(response.status).to.equal(409);
    expect(response.data.error).to.equal(
      'Category with name "Tools" already exists',
    );
  });

  it("should reject a duplicate slug", async () => {
    await createCategory({ name: "Tools", type: "project" });

    const response = await client.post<{ error: string }>(
      "/api/v1/categories",
      { name: "Other tools", slug: "tools", type: "project" },
    );

    expect(response.status).to.equal(409);
    expect(response.data.error).to.equal(
      'Category with slug "tools" already exists',
    );
  });

  it("should reject an invalid slug", async () => {
    const response = await client.post<{ error: string }>(
      "/api/v1/categories",
      { name: "Tools", slug: "Not A Slug", type: "project" },
    );

    expect(response.status).to.equal(400);
  });

  it("should filter by type and hide inactive categories", async () => {
    await createCategory({ name: "Guides", type: "article" });
    await createCategory({ name: "Tools", type: "project" });
    await createCategory({ name: "Archive", type: "project", isActive: false });

    const projects = await client.get<PaginatedResult<Category>>(
      "/api/v1/categories?type=project",
    );
    expect(projects.data.data.map((c) => c.name)).to.deep.equal(["Tools"]);

    const everything = await client.get<PaginatedResult<Category>>(
      "/api/v1/categories?activeOnly=false",
    );
    expect(everything.data.data.map((c) => c.name)).to.deep.equal([
      "Archive",
      "Guides",
      "Tools",
    ]);
  });

  it("should search active categories", async () => {
    await createCategory({ name: "Tools", description: "Workshop helpers", type: "project" });
    await createCategory({ name: "Toys", type: "project", isActive: false });

    const response = await client.get<PaginatedResult<Category>>(
      "/api/v1/categories/search?q=to",
    );

    expect(response.data.data.map((c) => c.name)).to.deep.equal(["Tools"]);
  });

  it("should get a category by slug", async () => {
    const category = await createCategory({ name: "Tools", type: "project" });

    const response = await client.get<Category>("/api/v1/categories/slug/tools");

    expect(response.status).to.equal(200);
    expect(response.data.id).to.equal(category.id);
  });

  it("should deactivate on delete and reactivate", async () => {
    const category = await createCategory({ name: "Tools", type: "project" });

    const removed = await client.delete<Category>(
      `/api/v1/categories/${category.id}`,
    );
    expect(removed.status).to.equal(200);
    expect(removed.data.isActive).to.equal(false);

    const restored = await client.post<Category>(
      `/api/v1/categories/${category.id}/activate`,
    );
    expect(restored.data.isActive).to.equal(true);
  });

  it("should update the name and clear the description", async () => {
    const category = await createCategory({
      name: "Tools",
      description: "Workshop helpers",
      type: "project",
    });

    const response = await client.put<Category>(
      `/api/v1/categories/${category.id}`,
      { name: "Workshop", description: null },
    );

    expect(response.status).to.equal(200);
    expect(response.data.name).to.equal("Workshop");
    expect(response.data.description).to.equal(undefined);
    expect(response.data.slug).to.equal("tools");
  });
});
