import { Result, success, failure, toError } from "../../lib/core/index.js";
import { createLogger } from "../../lib/logger/index.js";
import {
  validateKey,
  type FileContent,
  type FileInfo,
} from "../../lib/storage/index.js";
import type { DataContext } from "../data-context.js";

const logger = createLogger("printhub:domain:file");

/**
 * Storage calls wrapped as Results; invalid keys surface as ValidationError
 */

export async function readStoredFile(
  ctx: DataContext,
  key: string,
): Promise<Result<FileContent | null, Error>> {
  try {
    return success(await ctx.storage.read(validateKey(key)));
  } catch (error) {
    return failure(toError(error));
  }
}

export async function getFileInfo(
  ctx: DataContext,
  key: string,
): Promise<Result<FileInfo | null, Error>> {
  try {
    return success(await ctx.storage.info(validateKey(key)));
  } catch (error) {
    return failure(toError(error));
  }
}

export async function listFiles(
  ctx: DataContext,
  prefix?: string,
): Promise<Result<FileInfo[], Error>> {
  try {
    const safePrefix = prefix ? validateKey(prefix, "folder") : undefined;
    return success(await ctx.storage.list(safePrefix));
  } catch (error) {
    return failure(toError(error));
  }
}

export async function deleteStoredFile(
  ctx: DataContext,
  key: string,
): Promise<Result<boolean, Error>> {
  try {
    const deleted = await ctx.storage.delete(validateKey(key));
    if (deleted) logger.info("Deleted stored file", { key });
    return success(deleted);
  } catch (error) {
    return failure(toError(error));
  }
}

export async function createPresignedUrl(
  ctx: DataContext,
  key: string,
  expiresInSeconds: number,
): Promise<Result<string, Error>> {
  try {
    return success(
      await ctx.storage.presignedUrl(validateKey(key), expiresInSeconds),
    );
  } catch (error) {
    return failure(toError(error));
  }
}
