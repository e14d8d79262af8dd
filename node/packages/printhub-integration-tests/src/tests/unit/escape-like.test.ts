import { expect } from "chai";
import { escapeLike } from "printhub";

describe("escapeLike", () => {
  it("should escape wildcards and the escape character", () => {
    expect(escapeLike("10%_off")).to.equal("10\\%\\_off");
    expect(escapeLike("a\\b")).to.equal("a\\\\b");
  });

  it("should leave other text alone", () => {
    expect(escapeLike("resin printing")).to.equal("resin printing");
  });
});
