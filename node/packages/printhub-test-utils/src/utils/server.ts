import { mkdtemp, rm, utimes } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import {
  loadConfig,
  startServer,
  MemoryCache,
  LocalStorage,
  type Config,
  type DataContext,
  type RunningServer,
} from "printhub";
import { createTestLogger, type Logger } from "./test-logger.js";
import { RecordingNotifier } from "./recording-notifier.js";
import type { TestDatabase } from "./test-db.js";

export const TEST_SECRET = "test-secret";

export interface TestServerOptions {
  db: TestDatabase;
  logger?: Logger;
  env?: Record<string, string>;
}

/**
 * The real app served in-process on a free port, against the test
 * database, a memory cache, local storage in a temp directory and a
 * recording notifier.
 */
export class TestServer {
  private running: RunningServer | null = null;
  private uploadDir: string | null = null;
  private db: TestDatabase;
  private logger: Logger;
  private env: Record<string, string>;
  readonly notifier = new RecordingNotifier();
  readonly cache = new MemoryCache(300);

  constructor(options: TestServerOptions) {
    this.db = options.db;
    this.logger = options.logger ?? createTestLogger("test-server");
    this.env = options.env ?? {};
  }

  async start(): Promise<void> {
    this.uploadDir = await mkdtemp(join(tmpdir(), "printhub-test-uploads-"));

    const config: Config = loadConfig({
      NODE_ENV: "test",
      HOST: "127.0.0.1",
      PORT: "0",
      SECRET_KEY: TEST_SECRET,
      UPLOAD_DIR: this.uploadDir,
      MAX_FILE_SIZE: String(1024 * 1024),
      ALLOWED_FILE_TYPES: ".stl,.obj,.3mf,.jpg,.jpeg,.png,.pdf",
      ...this.env,
    });

    const ctx: DataContext = {
      db: this.db.getKnex(),
      config,
      cache: this.cache,
      storage: new LocalStorage(this.uploadDir),
      notifier: this.notifier,
    };

    this.running = await startServer(config, ctx);
    this.logger.info(`Test server listening on ${this.baseUrl}`);
  }

  get baseUrl(): string {
    if (!this.running) throw new Error("Server not started");
    return `http://127.0.0.1:${this.running.port}`;
  }

  get ctx(): DataContext {
    if (!this.running) throw new Error("Server not started");
    return this.running.ctx;
  }

  /**
   * Backdate a stored file, for age-based cleanup
   */
  async setFileModified(key: string, modifiedAt: Date): Promise<void> {
    if (!this.uploadDir) throw new Error("Server not started");
    await utimes(join(this.uploadDir, ...key.split("/")), modifiedAt, modifiedAt);
  }

  /**
   * Forget cached values and recorded notifications between tests
   */
  async reset(): Promise<void> {
    await this.cache.clear();
    this.notifier.reset();
  }

  async stop(): Promise<void> {
    if (this.running) {
      await this.running.close();
      this.running = null;
    }
    if (this.uploadDir) {
      await rm(this.uploadDir, { recursive: true, force: true });
      this.uploadDir = null;
    }
  }
}
