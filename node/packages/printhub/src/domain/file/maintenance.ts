import { Result, success, failure, toError } from "../../lib/core/index.js";
import { createLogger } from "../../lib/logger/index.js";
import {
  contentTypeFor,
  fileCategory,
  fileExtension,
  sanitizeFilename,
  validateUpload,
  type FileInfo,
} from "../../lib/storage/index.js";
import {
  parseJson,
  type ArticleDbRow,
  type OrderFileDbRow,
  type ProjectDbRow,
  type ReviewDbRow,
} from "../../lib/db/index.js";
import type { DataContext } from "../data-context.js";
import type {
  CleanupStats,
  FileUsage,
  FileValidation,
  FullCleanupResult,
  ReviewImage,
  StorageStats,
} from "../../types.js";

const logger = createLogger("printhub:domain:file:maintenance");

const DAY_MS = 24 * 60 * 60 * 1000;

export const TEMP_FOLDER = "temp";

// Folders whose files belong to a database row
export const MANAGED_FOLDERS = ["projects", "orders", "reviews"];

function emptyStats(): CleanupStats {
  return { checked: 0, deleted: 0, bytesFreed: 0, errors: 0 };
}

function addUsage(
  usage: Partial<Record<string, FileUsage>>,
  name: string,
  size: number,
): void {
  const current = usage[name] ?? { count: 0, sizeBytes: 0 };
  usage[name] = { count: current.count + 1, sizeBytes: current.sizeBytes + size };
}

/**
 * Check a file name and size against the upload rules without storing
 */
export function validateFile(
  ctx: DataContext,
  filename: string,
  size?: number,
): FileValidation {
  const errors: string[] = [];
  try {
    // Size 1 stands in for "unknown" so only the name is judged
    validateUpload(filename, size ?? 1, {
      allowedExtensions: ctx.config.storage.allowedFileTypes,
      maxFileSize: ctx.config.storage.maxFileSize,
    });
  } catch (error) {
    errors.push(toError(error).message);
  }

  return {
    filename: sanitizeFilename(filename),
    valid: errors.length === 0,
    errors,
    extension: fileExtension(filename),
    category: fileCategory(filename),
    contentType: contentTypeFor(filename),
  };
}

export async function getStorageStats(
  ctx: DataContext,
): Promise<Result<StorageStats, Error>> {
  try {
    const files = await ctx.storage.list();
    const stats: StorageStats = {
      totalFiles: 0,
      totalSizeBytes: 0,
      byCategory: {},
      byFolder: {},
    };

    for (const file of files) {
      stats.totalFiles++;
      stats.totalSizeBytes += file.size;
      addUsage(stats.byCategory, fileCategory(file.key), file.size);
      addUsage(stats.byFolder, file.key.split("/")[0] ?? file.key, file.size);
    }

    return success(stats);
  } catch (error) {
    logger.error("Failed to compute storage stats", { error });
    return failure(toError(error));
  }
}

async function deleteFiles(
  ctx: DataContext,
  files: FileInfo[],
  stats: CleanupStats,
): Promise<void> {
  for (const file of files) {
    try {
      if (await ctx.storage.delete(file.key)) {
        stats.deleted++;
        stats.bytesFreed += file.size;
      }
    } catch (error) {
      logger.warn("Failed to delete file during cleanup", {
        key: file.key,
        error,
      });
      stats.errors++;
    }
  }
}

/**
 * Delete files under temp/ last modified more than `maxAgeDays` ago
 */
export async function cleanupTempFiles(
  ctx: DataContext,
  maxAgeDays: number,
): Promise<Result<CleanupStats, Error>> {
  try {
    const cutoff = Date.now() - maxAgeDays * DAY_MS;
    const files = await ctx.storage.list(TEMP_FOLDER);
    const stats = emptyStats();
    stats.checked = files.length;

    await deleteFiles(
      ctx,
      files.filter(
        (file) => file.lastModified !== undefined && file.lastModified < cutoff,
      ),
      stats,
    );

    logger.info("Temp file cleanup finished", { maxAgeDays, ...stats });
    return success(stats);
  } catch (error) {
    logger.error("Failed to clean up temp files", { error });
    return failure(toError(error));
  }
}

/**
 * Keys and URLs of every stored file a row still points at
 */
async function referencedFiles(ctx: DataContext): Promise<Set<string>> {
  const refs = new Set<string>();

  const projects: Pick<ProjectDbRow, "stl_file" | "images">[] = await ctx
    .db<ProjectDbRow>("project")
    .select("stl_file", "images");
  for (const project of projects) {
    if (project.stl_file) refs.add(project.stl_file);
    for (const url of parseJson<string[]>(project.images, [])) refs.add(url);
  }

  const orderFiles: Pick<OrderFileDbRow, "file_path">[] = await ctx
    .db<OrderFileDbRow>("order_file")
    .select("file_path");
  for (const file of orderFiles) refs.add(file.file_path);

  const reviews: Pick<ReviewDbRow, "images">[] = await ctx
    .db<ReviewDbRow>("review")
    .select("images");
  for (const review of reviews) {
    for (const image of parseJson<ReviewImage[]>(review.images, [])) {
      refs.add(image.url);
    }
  }

  const articles: Pick<ArticleDbRow, "featured_image">[] = await ctx
    .db<ArticleDbRow>("article")
    .whereNotNull("featured_image")
    .select("featured_image");
  for (const article of articles) {
    if (article.featured_image) refs.add(article.featured_image);
  }

  return refs;
}

/**
 * Delete files in the managed folders that no row references any more
 */
export async function cleanupOrphanedFiles(
  ctx: DataContext,
): Promise<Result<CleanupStats, Error>> {
  try {
    const refs = await referencedFiles(ctx);
    const stats = emptyStats();
    const orphans: FileInfo[] = [];

    for (const folder of MANAGED_FOLDERS) {
      const files = await ctx.storage.list(folder);
      stats.checked += files.length;
      orphans.push(
        ...files.filter(
          (file) =>
            !refs.has(file.key) && !refs.has(ctx.storage.publicUrl(file.key)),
        ),
      );
    }

    await deleteFiles(ctx, orphans, stats);

    logger.info("Orphaned file cleanup finished", { ...stats });
    return success(stats);
  } catch (error) {
    logger.error("Failed to clean up orphaned files", { error });
    return failure(toError(error));
  }
}

export async function fullCleanup(
  ctx: DataContext,
  maxAgeDays: number,
): Promise<Result<FullCleanupResult, Error>> {
  const orphaned = await cleanupOrphanedFiles(ctx);
  if (!orphaned.success) return orphaned;

  const temp = await cleanupTempFiles(ctx, maxAgeDays);
  if (!temp.success) return temp;

  return success({
    orphaned: orphaned.data,
    temp: temp.data,
    totals: {
      deleted: orphaned.data.deleted + temp.data.deleted,
      bytesFreed: orphaned.data.bytesFreed + temp.data.bytesFreed,
    },
  });
}
