import { expect } from "chai";
import { TestHttpClient, TestServer, testLogger } from "@printhub/test-utils";
import { client, testDb } from "../test-setup.js";

function fromOrigin(http: TestHttpClient, origin: string, method = "GET") {
  return http.request("/api/v1/services", {
    method,
    headers:
      method === "OPTIONS"
        ? { Origin: origin, "Access-Control-Request-Method": "POST" }
        : { Origin: origin },
  });
}

describe("CORS", () => {
  describe("with the default origins", () => {
    it("should echo an allowed origin", async () => {
      const response = await fromOrigin(client, "http://localhost:3000");

      expect(response.status).to.equal(200);
      expect(response.headers["access-control-allow-origin"]).to.equal(
        "http://localhost:3000",
      );
      expect(response.headers["access-control-allow-credentials"]).to.equal("true");
    });

    it("should leave the header out for other origins", async () => {
      const response = await fromOrigin(client, "http://evil.example");

      expect(response.status).to.equal(200);
      expect(response.headers).to.not.have.property("access-control-allow-origin");
    });

    it("should answer preflight requests from an allowed origin", async () => {
      const response = await fromOrigin(client, "http://localhost:5173", "OPTIONS");

      expect(response.status).to.equal(204);
      expect(response.headers["access-control-allow-origin"]).to.equal(
        "http://localhost:5173",
      );
      expect(response.headers["access-control-allow-methods"]).to.equal(
        "GET,HEAD,PUT,PATCH,POST,DELETE",
      );
    });
  });

  describe("with ALLOWED_ORIGINS=*", () => {
    const openServer = new TestServer({
      db: testDb,
      logger: testLogger,
      env: { ALLOWED_ORIGINS: "*" },
    });
    const openClient = new TestHttpClient("");

    before(async () => {
      await openServer.start();
      openClient.baseUrl = openServer.baseUrl;
    });

    after(async () => {
      await openServer.stop();
    });

    it("should echo any origin", async () => {
      const response = await fromOrigin(openClient, "http://anywhere.example");

      expect(response.status).to.equal(200);
      expect(response.headers["access-control-allow-origin"]).to.equal(
        "http://anywhere.example",
      );
    });
  });
});
