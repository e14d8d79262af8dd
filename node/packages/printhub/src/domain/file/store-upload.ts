import { Result, success, failure, toError } from "../../lib/core/index.js";
import { createLogger } from "../../lib/logger/index.js";
import { buildKey, contentTypeFor, validateUpload } from "../../lib/storage/index.js";
import type { DataContext } from "../data-context.js";

const logger = createLogger("printhub:domain:file");

/**
 * The parts of a multer file the storage layer needs
 */
export type UploadedFile = {
  originalname: string;
  size: number;
  buffer: Buffer;
  mimetype?: string;
};

export type StoredFile = {
  key: string;
  url: string;
  filename: string;
  size: number;
  contentType: string;
};

/**
 * Validate an upload against the configured rules and store it under
 * `folder`. `allowedExtensions` narrows the configured list.
 */
export async function storeUpload(
  ctx: DataContext,
  folder: string,
  file: UploadedFile,
  allowedExtensions: string[] = ctx.config.storage.allowedFileTypes,
): Promise<Result<StoredFile, Error>> {
  try {
    validateUpload(file.originalname, file.size, {
      allowedExtensions,
      maxFileSize: ctx.config.storage.maxFileSize,
    });

    const key = buildKey(folder, file.originalname);
    const contentType =
      file.mimetype && file.mimetype !== "application/octet-stream"
        ? file.mimetype
        : contentTypeFor(file.originalname);
    const info = await ctx.storage.save(key, file.buffer, contentType);

    logger.info("Stored upload", { key, size: info.size });
    return success({
      key: info.key,
      url: info.url,
      filename: file.originalname,
      size: info.size,
      contentType,
    });
  } catch (error) {
    return failure(toError(error));
  }
}

/**
 * Remove files stored for a request that did not complete.
 * Failures are logged; the caller already has an error to report.
 */
export async function discardStored(
  ctx: DataContext,
  keys: string[],
): Promise<void> {
  for (const key of keys) {
    try {
      await ctx.storage.delete(key);
    } catch (error) {
      logger.warn("Failed to discard stored upload", { key, error });
    }
  }
}

/**
 * Store several uploads under one folder. Either all are stored or,
 * on the first rejected file, the ones already written are removed.
 */
export async function storeUploads(
  ctx: DataContext,
  folder: string,
  files: UploadedFile[],
  allowedExtensions?: string[],
): Promise<Result<StoredFile[], Error>> {
  const stored: StoredFile[] = [];
  for (const file of files) {
    const result = await storeUpload(ctx, folder, file, allowedExtensions);
    if (!result.success) {
      await discardStored(
        ctx,
        stored.map((s) => s.key),
      );
      return result;
    }
    stored.push(result.data);
  }
  return success(stored);
}
