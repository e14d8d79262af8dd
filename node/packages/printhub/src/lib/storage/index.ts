import type { Config } from "../../config.js";
import { createLogger } from "../logger/index.js";
import { LocalStorage } from "./local-storage.js";
import { S3Storage } from "./s3-storage.js";
import type { FileStorage } from "./types.js";

export type { FileStorage, FileInfo, FileContent, StorageKind } from "./types.js";
export * from "./files.js";
export { LocalStorage } from "./local-storage.js";
export { S3Storage } from "./s3-storage.js";

const logger = createLogger("printhub:storage");

export function createStorage(config: Config): FileStorage {
  if (config.storage.useS3) {
    logger.info("Using S3 storage", { bucket: config.storage.s3.bucket });
    return new S3Storage(config.storage.s3);
  }
  logger.info("Using local storage", { dir: config.storage.uploadDir });
  return new LocalStorage(config.storage.uploadDir);
}
