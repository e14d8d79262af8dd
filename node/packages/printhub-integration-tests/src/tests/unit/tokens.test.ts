import { expect } from "chai";
import { SignJWT } from "jose";
import { createAccessToken, verifyAccessToken } from "printhub";

const settings = { secretKey: "test-secret", accessTokenExpireMinutes: 30 };

describe("Access tokens", () => {
  it("should carry the user id, username and role", async () => {
    const token = await createAccessToken(
      { userId: "user-1", username: "admin", role: "admin" },
      settings,
    );

    expect(await verifyAccessToken(token, "test-secret")).to.deep.equal({
      userId: "user-1",
      username: "admin",
      role: "admin",
    });
  });

  it("should reject a token signed with another secret", async () => {
    const token = await createAccessToken(
      { userId: "user-1", username: "admin", role: "admin" },
      settings,
    );

    expect(await verifyAccessToken(token, "other-secret")).to.equal(null);
  });

  it("should reject an expired token", async () => {
    const token = await new SignJWT({ username: "admin", role: "admin" })
      .setProtectedHeader({ alg: "HS256" })
      .setSubject("user-1")
      .setIssuedAt(Math.floor(Date.now() / 1000) - 3600)
      .setExpirationTime(Math.floor(Date.now() / 1000) - 60)
      .sign(new TextEncoder().encode("test-secret"));

    expect(await verifyAccessToken(token, "test-secret")).to.equal(null);
  });

  it("should reject an unknown role", async () => {
    const token = await new SignJWT({ username: "admin", role: "root" })
      .setProtectedHeader({ alg: "HS256" })
      .setSubject("user-1")
      .setExpirationTime("5m")
      .sign(new TextEncoder().encode("test-secret"));

    expect(await verifyAccessToken(token, "test-secret")).to.equal(null);
  });

  it("should reject garbage", async () => {
    expect(await verifyAccessToken("not.a.token", "test-secret")).to.equal(null);
  });
});
