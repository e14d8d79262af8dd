import {
  TestDatabase,
  TestServer,
  TestHttpClient,
  testLogger,
  serverLogLevel,
} from "@printhub/test-utils";
import { configureLogger, type DataContext } from "printhub";
import { use } from "chai";
import chaiAsPromised from "chai-as-promised";

// Setup chai-as-promised for async assertions
use(chaiAsPromised);

// Must run before the first log line is written
configureLogger(serverLogLevel);

export const testDb = new TestDatabase({ logger: testLogger });

export const testServer = new TestServer({
  db: testDb,
  logger: testLogger,
});

// Base URL is filled in once the server has a port
export const client = new TestHttpClient("");

/**
 * Context of the server under test, for seeding rows directly
 */
export function ctx(): DataContext {
  return testServer.ctx;
}

before(async function () {
  this.timeout(60000);

  testLogger.info("Starting PrintHub integration test setup...");
  await testDb.setup();
  await testServer.start();
  client.baseUrl = testServer.baseUrl;
  testLogger.info("PrintHub integration test setup complete");
});

afterEach(async function () {
  await testDb.truncateAllTables();
  await testServer.reset();
  client.clearToken();
});

after(async function () {
  this.timeout(30000);

  testLogger.info("Shutting down PrintHub integration tests...");
  await testServer.stop();
  await testDb.cleanup();
  testLogger.info("PrintHub integration test teardown complete");
});
