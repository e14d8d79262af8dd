import { expect } from "chai";
import { slugify } from "printhub";

describe("slugify", () => {
  it("should lowercase and join words with dashes", () => {
    expect(slugify("Miniatures & Figures")).to.equal("miniatures-figures");
    expect(slugify("  Large  Format Printing ")).to.equal("large-format-printing");
  });

  it("should strip accents", () => {
    expect(slugify("Café Crème")).to.equal("cafe-creme");
  });

  it("should keep digits", () => {
    expect(slugify("Top 10 PLA tips")).to.equal("top-10-pla-tips");
  });

  it("should fall back to a random slug without ASCII letters", () => {
    expect(slugify("Печать")).to.match(/^item-[0-9a-f]{8}$/);
    expect(slugify("!!!")).to.match(/^item-[0-9a-f]{8}$/);
  });
});
