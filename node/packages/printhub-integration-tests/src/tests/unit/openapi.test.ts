import { expect } from "chai";
import { z } from "zod";
import { buildOpenApiDocument, toOpenApiPath } from "printhub";

describe("OpenAPI document", () => {
  it("should convert route parameters", () => {
    expect(toOpenApiPath("/api/v1/orders/:id/files")).to.deep.equal({
      path: "/api/v1/orders/{id}/files",
      params: ["id"],
    });
    expect(toOpenApiPath("/api/v1/services")).to.deep.equal({
      path: "/api/v1/services",
      params: [],
    });
  });

  it("should describe access and request bodies", () => {
    const document = buildOpenApiDocument("2.0.0", [
      {
        method: "get",
        path: "/things/:thingId",
        summary: "Get thing",
        tag: "things",
        access: "public",
      },
      {
        method: "post",
        path: "/things",
        summary: "Create thing",
        tag: "things",
        access: "admin",
        body: z.object({ name: z.string() }),
      },
    ]);

    expect(document.info.version).to.equal("2.0.0");
    expect(document.tags).to.deep.equal([{ name: "things" }]);

    const get = document.paths["/things/{thingId}"]?.["get"];
    expect(get).to.have.deep.property("parameters", [
      { name: "thingId", in: "path", required: true, schema: { type: "string" } },
    ]);
    expect(get).to.not.have.property("security");

    const post = document.paths["/things"]?.["post"];
    expect(post).to.have.deep.property("security", [{ bearerAuth: [] }]);
    expect(post).to.have.nested.property("responses.403");
    expect(post).to.have.nested.property(
      "requestBody.content.application/json.schema.type",
      "object",
    );
  });
});
