import { expect } from "chai";
import { createDatabase, rollbackMigrations, runMigrations } from "printhub";

describe("Migrations", () => {
  let db: ReturnType<typeof createDatabase>;

  beforeEach(() => {
    db = createDatabase("sqlite::memory:");
  });

  afterEach(async () => {
    await db.destroy();
  });

  it("should apply and roll back the schema", async () => {
    expect(await runMigrations(db)).to.deep.equal(["001_initial"]);
    expect(await db.schema.hasTable("order")).to.equal(true);

    expect(await rollbackMigrations(db)).to.deep.equal(["001_initial"]);
    expect(await db.schema.hasTable("order")).to.equal(false);
    expect(await db.schema.hasTable("user")).to.equal(false);

    expect(await runMigrations(db)).to.deep.equal(["001_initial"]);
  });

  it("should have nothing to roll back on an empty database", async () => {
    expect(await rollbackMigrations(db)).to.deep.equal([]);
  });
});
