import { expect } from "chai";
import { loadConfig } from "printhub";

describe("loadConfig", () => {
  it("should apply defaults", () => {
    const config = loadConfig({});

    expect(config.environment).to.equal("development");
    expect(config.isProduction).to.equal(false);
    expect(config.server).to.deep.equal({ host: "0.0.0.0", port: 8000, workers: 1 });
    expect(config.auth).to.deep.equal({
      secretKey: "dev-secret-change-me",
      accessTokenExpireMinutes: 30,
    });
    expect(config.db.url).to.equal("sqlite:./data/printhub.db");
    expect(config.cache.redisUrl).to.equal(undefined);
    expect(config.storage.useS3).to.equal(false);
    expect(config.storage.maxFileSize).to.equal(50 * 1024 * 1024);
    expect(config.storage.allowedFileTypes).to.deep.equal([
      ".stl",
      ".obj",
      ".3mf",
      ".jpg",
      ".jpeg",
      ".png",
    ]);
    expect(config.docs.enabled).to.equal(true);
    expect(config.notifications.telegramWebhookUrl).to.equal("");
  });

  it("should read overrides from the environment", () => {
    const config = loadConfig({
      NODE_ENV: "production",
      SECRET_KEY: "test-secret",
      PORT: "9000",
      WORKERS: "4",
      USE_S3: "yes",
      REDIS_URL: "redis://cache:6379/0",
      ALLOWED_FILE_TYPES: ".STL, .Obj ,",
      ALLOWED_ORIGINS: "https://shop.example.com",
    });

    expect(config.isProduction).to.equal(true);
    expect(config.auth.secretKey).to.equal("test-secret");
    expect(config.server.port).to.equal(9000);
    expect(config.server.workers).to.equal(4);
    expect(config.storage.useS3).to.equal(true);
    expect(config.cache.redisUrl).to.equal("redis://cache:6379/0");
    expect(config.storage.allowedFileTypes).to.deep.equal([".stl", ".obj"]);
    expect(config.cors.allowedOrigins).to.deep.equal(["https://shop.example.com"]);
    expect(config.docs.enabled).to.equal(false);
  });

  it("should ignore unparseable numbers", () => {
    const config = loadConfig({ PORT: "eighty", WORKERS: "0" });

    expect(config.server.port).to.equal(8000);
    expect(config.server.workers).to.equal(1);
  });
});
