import { expect } from "chai";
import { parseDatabaseUrl } from "printhub";

describe("parseDatabaseUrl", () => {
  it("should read SQLite paths", () => {
    expect(parseDatabaseUrl("sqlite:./data/app.db")).to.deep.equal({
      type: "sqlite",
      path: "./data/app.db",
    });
    expect(parseDatabaseUrl("sqlite:///./data/app.db")).to.deep.equal({
      type: "sqlite",
      path: "./data/app.db",
    });
    expect(parseDatabaseUrl("sqlite::memory:")).to.deep.equal({
      type: "sqlite",
      path: ":memory:",
    });
  });

  it("should pass PostgreSQL URLs through", () => {
    expect(
      parseDatabaseUrl("postgresql://printhub:test-secret@db:5432/printhub"),
    ).to.deep.equal({
      type: "postgres",
      connectionString: "postgresql://printhub:test-secret@db:5432/printhub",
    });
  });

  it("should reject other schemes", () => {
    expect(() => parseDatabaseUrl("mysql://db/printhub")).to.throw(
      "Unsupported DATABASE_URL scheme: mysql://db/printhub",
    );
  });
});
