import { expect } from "chai";
import { loginAsNewAdmin } from "@printhub/test-utils";
import type { Color } from "printhub";
import { client, ctx } from "../test-setup.js";

describe("Colors API", () => {
  async function createColor(body: Record<string, unknown>): Promise<Color> {
    const response = await client.post<Color>("/api/v1/colors", body);
    expect(response.status).to.equal(201);
    return response.data;
  }

  it("should list the color types", async () => {
    const response = await client.get("/api/v1/colors/types");

    expect(response.data).to.deep.equal([
      { value: "solid", label: "Solid" },
      { value: "gradient", label: "Gradient" },
      { value: "metallic", label: "Metallic" },
    ]);
  });

  describe("POST /api/v1/colors", () => {
    it("should create a solid color with defaults", async () => {
      await loginAsNewAdmin(ctx(), client);

      const color = await createColor({ name: "Red", hexCode: "#FF0000" });

      expect(color).to.include({
        name: "Red",
        type: "solid",
        hexCode: "#FF0000",
        isActive: true,
        isNew: false,
        sortOrder: 0,
        priceModifier: 1,
      });
      expect(color).to.not.have.property("gradientColors");
      expect(color).to.not.have.property("metallicBase");
    });

    it("should require a hex code for solid colors", async () => {
      await loginAsNewAdmin(ctx(), client);

      const response = await client.post<{ error: string }>("/api/v1/colors", {
        name: "Nothing",
      });

      expect(response.status).to.equal(400);
      expect(response.data.error).to.equal("hexCode is required for solid colors");
    });

    it("should reject a malformed hex code", async () => {
      await loginAsNewAdmin(ctx(), client);

      const response = await client.post<{ error: string }>("/api/v1/colors", {
        name: "Bad",
        hexCode: "red",
      });

      expect(response.status).to.equal(400);
      expect(response.data.error).to.equal("Invalid request");
    });

    it("should create a gradient with a linear default", async () => {
      await loginAsNewAdmin(ctx(), client);

      const color = await createColor({
        name: "Sunset",
        type: "gradient",
        hexCode: "#000000",
        gradientColors: [
          { color: "#FF7E5F", position: 0 },
          { color: "#FEB47B", position: 100 },
        ],
      });

      expect(color.type).to.equal("gradient");
      if (color.type !== "gradient") return;
      expect(color.gradientDirection).to.equal("linear");
      expect(color.gradientColors).to.deep.equal([
        { color: "#FF7E5F", position: 0 },
        { color: "#FEB47B", position: 100 },
      ]);
      expect(color).to.not.have.property("hexCode");
    });

    it("should need two gradient stops", async () => {
      await loginAsNewAdmin(ctx(), client);

      const response = await client.post<{ error: string }>("/api/v1/colors", {
        name: "Flat",
        type: "gradient",
        gradientColors: [{ color: "#FFFFFF", position: 0 }],
      });

      expect(response.status).to.equal(400);
      expect(response.data.error).to.equal(
        "Gradient colors need at least 2 color stops",
      );
    });

    it("should default the metallic intensity", async () => {
      await loginAsNewAdmin(ctx(), client);

      const color = await createColor({
        name: "Gold",
        type: "metallic",
        metallicBase: "#D4AF37",
        priceModifier: 1.5,
      });

      expect(color).to.include({
        type: "metallic",
        metallicBase: "#D4AF37",
        metallicIntensity: 0.5,
        priceModifier: 1.5,
      });
    });

    it("should reject a non-positive price modifier", async () => {
      await loginAsNewAdmin(ctx(), client);

      const response = await client.post("/api/v1/colors", {
        name: "Free",
        hexCode: "#FFFFFF",
        priceModifier: 0,
      });

      expect(response.status).to.equal(400);
    });
  });

  describe("listing", () => {
    beforeEach(async () => {
      await loginAsNewAdmin(ctx(), client);
      await createColor({ name: "White", hexCode: "#FFFFFF", sortOrder: 2 });
      await createColor({ name: "Black", hexCode: "#000000", sortOrder: 2 });
      await createColor({
        name: "Silver",
        type: "metallic",
        metallicBase: "#C0C0C0",
        sortOrder: 1,
      });
      await createColor({
        name: "Hidden",
        hexCode: "#123456",
        isActive: false,
      });
      client.clearToken();
    });

    it("should order by sort order then name", async () => {
      const response = await client.get<Color[]>("/api/v1/colors");

      expect(response.data.map((c) => c.name)).to.deep.equal([
        "Hidden",
        "Silver",
        "Black",
        "White",
      ]);
    });

    it("should filter active colors and types", async () => {
      const active = await client.get<Color[]>("/api/v1/colors?activeOnly=true");
      expect(active.data.map((c) => c.name)).to.deep.equal([
        "Silver",
        "Black",
        "White",
      ]);

      const solids = await client.get<Color[]>("/api/v1/colors?type=solid");
      expect(solids.data.map((c) => c.name)).to.deep.equal([
        "Hidden",
        "Black",
        "White",
      ]);
    });

    it("should list active colors by type", async () => {
      const response = await client.get<Color[]>("/api/v1/colors/by-type/solid");
      expect(response.data.map((c) => c.name)).to.deep.equal(["Black", "White"]);

      const invalid = await client.get("/api/v1/colors/by-type/neon");
      expect(invalid.status).to.equal(400);
    });
  });

  describe("updates", () => {
    it("should switch the type and clear the old fields", async () => {
      await loginAsNewAdmin(ctx(), client);
      const color = await createColor({ name: "Steel", hexCode: "#888888" });

      const response = await client.put<Color>(`/api/v1/colors/${color.id}`, {
        type: "metallic",
        metallicBase: "#71797E",
        metallicIntensity: 0.8,
      });

      expect(response.status).to.equal(200);
      expect(response.data).to.include({
        name: "Steel",
        type: "metallic",
        metallicBase: "#71797E",
        metallicIntensity: 0.8,
      });

      const back = await client.put<{ error: string }>(
        `/api/v1/colors/${color.id}`,
        { type: "solid" },
      );
      expect(back.status).to.equal(400);
      expect(back.data.error).to.equal("hexCode is required for solid colors");
    });

    it("should keep type fields on a partial update", async () => {
      await loginAsNewAdmin(ctx(), client);
      const color = await createColor({ name: "Blue", hexCode: "#0000FF" });

      const response = await client.put<Color>(`/api/v1/colors/${color.id}`, {
        name: "Navy",
      });

      expect(response.data).to.include({
        name: "Navy",
        type: "solid",
        hexCode: "#0000FF",
      });
    });

    it("should toggle flags", async () => {
      await loginAsNewAdmin(ctx(), client);
      const color = await createColor({ name: "Green", hexCode: "#00FF00" });

      const inactive = await client.patch<Color>(
        `/api/v1/colors/${color.id}/toggle-active`,
      );
      expect(inactive.data.isActive).to.equal(false);

      const active = await client.patch<Color>(
        `/api/v1/colors/${color.id}/toggle-active`,
      );
      expect(active.data.isActive).to.equal(true);

      const fresh = await client.patch<Color>(
        `/api/v1/colors/${color.id}/toggle-new`,
      );
      expect(fresh.data.isNew).to.equal(true);
    });

    it("should delete a color", async () => {
      await loginAsNewAdmin(ctx(), client);
      const color = await createColor({ name: "Pink", hexCode: "#FFC0CB" });

      const deleted = await client.delete(`/api/v1/colors/${color.id}`);
      expect(deleted.status).to.equal(204);

      const missing = await client.get<{ error: string }>(
        `/api/v1/colors/${color.id}`,
      );
      expect(missing.status).to.equal(404);
      expect(missing.data.error).to.equal("Color not found");

      const again = await client.delete<{ error: string }>(
        `/api/v1/colors/${color.id}`,
      );
      expect(again.data.error).to.equal(`Color not found: ${color.id}`);
    });
  });
});
