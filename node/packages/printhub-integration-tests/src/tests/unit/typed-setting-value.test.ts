import { expect } from "chai";
import { typedSettingValue, type SiteSetting } from "printhub";

function setting(
  valueType: SiteSetting["valueType"],
  value: string | undefined,
): SiteSetting {
  return {
    id: "setting-1",
    key: "example",
    value,
    valueType,
    category: "general",
    isPublic: true,
    createdAt: 0,
    updatedAt: 0,
  };
}

describe("typedSettingValue", () => {
  it("should return text as stored", () => {
    expect(typedSettingValue(setting("text", "PrintHub"))).to.equal("PrintHub");
    expect(typedSettingValue(setting("text", undefined))).to.equal(null);
  });

  it("should parse json and fall back to an empty object", () => {
    expect(typedSettingValue(setting("json", '{"a":[1,2]}'))).to.deep.equal({
      a: [1, 2],
    });
    expect(typedSettingValue(setting("json", "{broken"))).to.deep.equal({});
    expect(typedSettingValue(setting("json", undefined))).to.deep.equal({});
  });

  it("should read booleans", () => {
    expect(typedSettingValue(setting("boolean", "true"))).to.equal(true);
    expect(typedSettingValue(setting("boolean", "1"))).to.equal(true);
    expect(typedSettingValue(setting("boolean", " YES "))).to.equal(true);
    expect(typedSettingValue(setting("boolean", "no"))).to.equal(false);
    expect(typedSettingValue(setting("boolean", undefined))).to.equal(false);
  });

  it("should read numbers and fall back to zero", () => {
    expect(typedSettingValue(setting("number", "12.5"))).to.equal(12.5);
    expect(typedSettingValue(setting("number", "abc"))).to.equal(0);
    expect(typedSettingValue(setting("number", ""))).to.equal(0);
  });
});
