import { expect } from "chai";
import { loginAsNewAdmin, loginAsNewUser } from "@printhub/test-utils";
import type { PagedResult, Project } from "printhub";
import { client, ctx } from "../test-setup.js";

function fileForm(field: string, ...names: string[]): FormData {
  const form = new FormData();
  for (const name of names) {
    form.append(field, new Blob(["solid cube\nendsolid cube\n"]), name);
  }
  return form;
}

describe("Projects API", () => {
  async function createProject(body: Record<string, unknown>): Promise<Project> {
    const response = await client.post<Project>("/api/v1/projects", {
      category: "prototypes",
      ...body,
    });
    expect(response.status).to.equal(201);
    return response.data;
  }

  describe("POST /api/v1/projects", () => {
    it("should create a project with defaults", async () => {
      await loginAsNewAdmin(ctx(), client);

      const project = await createProject({ title: "Gear housing" });

      expect(project.title).to.equal("Gear housing");
      expect(project.category).to.equal("prototypes");
      expect(project.isFeatured).to.equal(false);
      expect(project.images).to.deep.equal([]);
      expect(project).to.not.have.property("stlFile");
    });

    it("should reject an inverted price range", async () => {
      await loginAsNewAdmin(ctx(), client);

      const response = await client.post<{ error: string }>("/api/v1/projects", {
        title: "Bracket",
        category: "parts",
        priceRangeMin: 50,
        priceRangeMax: 10,
      });

      expect(response.status).to.equal(400);
      expect(response.data.error).to.equal("Invalid request");
    });

    it("should require admin", async () => {
      await loginAsNewUser(ctx(), client);

      const response = await client.post("/api/v1/projects", {
        title: "Bracket",
        category: "parts",
      });

      expect(response.status).to.equal(403);
    });
  });

  describe("GET /api/v1/projects", () => {
    beforeEach(async () => {
      await loginAsNewAdmin(ctx(), client);
      await createProject({
        title: "Drone frame",
        category: "parts",
        estimatedPrice: 50,
        complexityLevel: "complex",
        estimatedDurationHours: 12,
      });
      await createProject({
        title: "Chess set",
        category: "art",
        priceRangeMin: 10,
        priceRangeMax: 30,
        complexityLevel: "simple",
        estimatedDurationHours: 3,
      });
      await createProject({
        title: "Lamp shade",
        category: "art",
        estimatedPrice: 200,
        isFeatured: true,
        complexityLevel: "medium",
      });
      client.clearToken();
    });

    it("should page featured projects first", async () => {
      const response = await client.get<PagedResult<Project>>(
        "/api/v1/projects?perPage=2",
      );

      expect(response.status).to.equal(200);
      expect(response.data.data).to.have.lengthOf(2);
      expect(response.data.data[0]?.title).to.equal("Lamp shade");
      expect(response.data.pagination).to.deep.equal({
        page: 1,
        perPage: 2,
        total: 3,
        pages: 2,
        hasNext: true,
        hasPrev: false,
      });

      const second = await client.get<PagedResult<Project>>(
        "/api/v1/projects?perPage=2&page=2",
      );
      expect(second.data.data).to.have.lengthOf(1);
      expect(second.data.pagination.hasNext).to.equal(false);
      expect(second.data.pagination.hasPrev).to.equal(true);
    });

    it("should filter by category and complexity", async () => {
      const byCategory = await client.get<PagedResult<Project>>(
        "/api/v1/projects?category=art",
      );
      expect(byCategory.data.data.map((p) => p.title).sort()).to.deep.equal([
        "Chess set",
        "Lamp shade",
      ]);

      const byComplexity = await client.get<PagedResult<Project>>(
        "/api/v1/projects?complexityLevels=simple,complex",
      );
      expect(byComplexity.data.data.map((p) => p.title).sort()).to.deep.equal([
        "Chess set",
        "Drone frame",
      ]);
    });

    it("should fall back to the price range when no estimate is set", async () => {
      const cheap = await client.get<PagedResult<Project>>(
        "/api/v1/projects?maxPrice=40",
      );
      expect(cheap.data.data.map((p) => p.title)).to.deep.equal(["Chess set"]);

      const pricey = await client.get<PagedResult<Project>>(
        "/api/v1/projects?minPrice=40",
      );
      expect(pricey.data.data.map((p) => p.title).sort()).to.deep.equal([
        "Drone frame",
        "Lamp shade",
      ]);
    });

    it("should filter by duration and search text", async () => {
      const quick = await client.get<PagedResult<Project>>(
        "/api/v1/projects?maxHours=5",
      );
      expect(quick.data.data.map((p) => p.title)).to.deep.equal(["Chess set"]);

      const search = await client.get<PagedResult<Project>>(
        "/api/v1/projects?search=DRONE",
      );
      expect(search.data.data.map((p) => p.title)).to.deep.equal(["Drone frame"]);
    });

    it("should reject an unknown complexity level", async () => {
      const response = await client.get("/api/v1/projects?complexityLevels=hard");
      expect(response.status).to.equal(400);
    });

    it("should list featured projects", async () => {
      const response = await client.get<Project[]>("/api/v1/projects/featured");
      expect(response.data.map((p) => p.title)).to.deep.equal(["Lamp shade"]);
    });

    it("should list distinct categories in order", async () => {
      const response = await client.get<string[]>("/api/v1/projects/categories");
      expect(response.data).to.deep.equal(["art", "parts"]);
    });
  });

  it("should list complexity levels", async () => {
    const response = await client.get<string[]>(
      "/api/v1/projects/complexity-levels",
    );
    expect(response.data).to.deep.equal(["simple", "medium", "complex"]);
  });

  describe("single project", () => {
    it("should get, update and delete a project", async () => {
      await loginAsNewAdmin(ctx(), client);
      const project = await createProject({
        title: "Vase",
        description: "Spiral vase",
        estimatedPrice: 25,
      });

      const fetched = await client.get<Project>(`/api/v1/projects/${project.id}`);
      expect(fetched.data.description).to.equal("Spiral vase");

      const updated = await client.put<Project>(`/api/v1/projects/${project.id}`, {
        description: null,
        estimatedPrice: null,
        isFeatured: true,
      });
      expect(updated.status).to.equal(200);
      expect(updated.data.isFeatured).to.equal(true);
      expect(updated.data).to.not.have.property("description");
      expect(updated.data).to.not.have.property("estimatedPrice");

      const refetched = await client.get<Project>(`/api/v1/projects/${project.id}`);
      expect(refetched.data.isFeatured).to.equal(true);

      const deleted = await client.delete(`/api/v1/projects/${project.id}`);
      expect(deleted.status).to.equal(204);

      const missing = await client.get<{ error: string }>(
        `/api/v1/projects/${project.id}`,
      );
      expect(missing.status).to.equal(404);
      expect(missing.data.error).to.equal("Project not found");
    });

    it("should answer 404 for an unknown project update", async () => {
      await loginAsNewAdmin(ctx(), client);

      const response = await client.put<{ error: string }>(
        "/api/v1/projects/missing-id",
        { title: "Nothing" },
      );

      expect(response.status).to.equal(404);
      expect(response.data.error).to.equal("Project not found: missing-id");
    });
  });

  describe("project files", () => {
    it("should upload and download an STL model", async () => {
      await loginAsNewAdmin(ctx(), client);
      const project = await createProject({ title: "Cube" });

      const noModel = await client.get<{ error: string }>(
        `/api/v1/projects/${project.id}/stl`,
      );
      expect(noModel.status).to.equal(404);
      expect(noModel.data.error).to.equal("STL file not found");

      const upload = await client.postForm<Project>(
        `/api/v1/projects/${project.id}/stl`,
        fileForm("file", "cube.stl"),
      );
      expect(upload.status).to.equal(200);
      expect(upload.data.stlFile).to.match(
        new RegExp(`^projects/${project.id}/stl/[0-9a-f-]{36}-cube\\.stl$`),
      );

      client.clearToken();
      const download = await client.get<string>(
        `/api/v1/projects/${project.id}/stl`,
      );
      expect(download.status).to.equal(200);
      expect(download.headers["content-type"]).to.equal("model/stl");
      expect(download.headers["content-disposition"]).to.match(
        /^attachment; filename="[0-9a-f-]{36}-cube\.stl"$/,
      );
      expect(download.data).to.equal("solid cube\nendsolid cube\n");
    });

    it("should replace the previous STL model", async () => {
      await loginAsNewAdmin(ctx(), client);
      const project = await createProject({ title: "Cube" });

      const first = await client.postForm<Project>(
        `/api/v1/projects/${project.id}/stl`,
        fileForm("file", "first.stl"),
      );
      const firstKey = first.data.stlFile ?? "";

      await client.postForm<Project>(
        `/api/v1/projects/${project.id}/stl`,
        fileForm("file", "second.stl"),
      );

      expect(await ctx().storage.info(firstKey)).to.equal(null);
    });

    it("should only accept STL models", async () => {
      await loginAsNewAdmin(ctx(), client);
      const project = await createProject({ title: "Cube" });

      const response = await client.postForm<{ error: string }>(
        `/api/v1/projects/${project.id}/stl`,
        fileForm("file", "cube.obj"),
      );

      expect(response.status).to.equal(400);
      expect(response.data.error).to.equal(
        "File type .obj is not allowed. Allowed: .stl",
      );
    });

    it("should append uploaded images", async () => {
      await loginAsNewAdmin(ctx(), client);
      const project = await createProject({
        title: "Figurine",
        images: ["/existing.png"],
      });

      const response = await client.postForm<Project>(
        `/api/v1/projects/${project.id}/images`,
        fileForm("files", "front.png", "back.jpg"),
      );

      expect(response.status).to.equal(200);
      expect(response.data.images).to.have.lengthOf(3);
      expect(response.data.images[0]).to.equal("/existing.png");
      expect(response.data.images[1]).to.match(
        new RegExp(
          `^/api/v1/files/raw/projects/${project.id}/images/[0-9a-f-]{36}-front\\.png$`,
        ),
      );
    });

    it("should store no images when one of them is rejected", async () => {
      await loginAsNewAdmin(ctx(), client);
      const project = await createProject({ title: "Figurine" });

      const response = await client.postForm<{ error: string }>(
        `/api/v1/projects/${project.id}/images`,
        fileForm("files", "front.png", "notes.txt"),
      );

      expect(response.status).to.equal(400);
      expect(await ctx().storage.list(`projects/${project.id}/images`)).to.deep.equal(
        [],
      );

      const fetched = await client.get<Project>(`/api/v1/projects/${project.id}`);
      expect(fetched.data.images).to.deep.equal([]);
    });

    it("should answer 400 when no images are sent", async () => {
      await loginAsNewAdmin(ctx(), client);
      const project = await createProject({ title: "Figurine" });

      const response = await client.postForm<{ error: string }>(
        `/api/v1/projects/${project.id}/images`,
        new FormData(),
      );

      expect(response.status).to.equal(400);
      expect(response.data.error).to.equal("No files uploaded");
    });
  });
});
