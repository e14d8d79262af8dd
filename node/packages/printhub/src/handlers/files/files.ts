import { Request, Response } from "express";
import { z } from "zod";
import { createLogger } from "../../lib/logger/index.js";
import { handleException, sendError } from "../../lib/http/index.js";
import type { DataContext } from "../../domain/data-context.js";
import { storeUpload } from "../../domain/file/store-upload.js";
import {
  createPresignedUrl,
  deleteStoredFile,
  getFileInfo,
  listFiles,
  readStoredFile,
} from "../../domain/file/file-operations.js";
import {
  cleanupOrphanedFiles,
  cleanupTempFiles,
  fullCleanup,
  getStorageStats,
  validateFile,
} from "../../domain/file/maintenance.js";

const logger = createLogger("printhub:handlers:files");

const uploadQuery = z.object({
  folder: z.string().min(1).default("uploads"),
});

const keyQuery = z.object({
  key: z.string().min(1),
});

const listQuery = z.object({
  prefix: z.string().min(1).optional(),
});

const validateQuery = z.object({
  filename: z.string().min(1),
  size: z.coerce.number().int().min(0).optional(),
});

const cleanupQuery = z.object({
  maxAgeDays: z.coerce.number().int().min(0).max(3650).default(7),
});

const presignQuery = keyQuery.extend({
  expiresIn: z.coerce.number().int().min(1).max(7 * 24 * 3600).default(3600),
});

/**
 * POST /api/v1/files/upload?folder= - multipart field `file`
 */
export function uploadFileHandler(ctx: DataContext) {
  return async (req: Request, res: Response): Promise<void> => {
    try {
      const { folder } = uploadQuery.parse(req.query);
      if (!req.file) {
        res.status(400).json({ error: "No file uploaded" });
        return;
      }

      const result = await storeUpload(ctx, folder, req.file);

      if (!result.success) {
        sendError(res, result.error);
        return;
      }

      res.status(201).json(result.data);
    } catch (error) {
      handleException(res, error, logger, "Failed to upload file");
    }
  };
}

/**
 * DELETE /api/v1/files?key=
 */
export function deleteFileHandler(ctx: DataContext) {
  return async (req: Request, res: Response): Promise<void> => {
    try {
      const { key } = keyQuery.parse(req.query);
      const result = await deleteStoredFile(ctx, key);

      if (!result.success) {
        sendError(res, result.error);
        return;
      }

      if (!result.data) {
        res.status(404).json({ error: "File not found" });
        return;
      }

      res.status(204).end();
    } catch (error) {
      handleException(res, error, logger, "Failed to delete file");
    }
  };
}

/**
 * GET /api/v1/files/list?prefix=
 */
export function listFilesHandler(ctx: DataContext) {
  return async (req: Request, res: Response): Promise<void> => {
    try {
      const { prefix } = listQuery.parse(req.query);
      const result = await listFiles(ctx, prefix);

      if (!result.success) {
        sendError(res, result.error);
        return;
      }

      res.json(result.data);
    } catch (error) {
      handleException(res, error, logger, "Failed to list files");
    }
  };
}

/**
 * GET /api/v1/files/info?key=
 */
export function fileInfoHandler(ctx: DataContext) {
  return async (req: Request, res: Response): Promise<void> => {
    try {
      const { key } = keyQuery.parse(req.query);
      const result = await getFileInfo(ctx, key);

      if (!result.success) {
        sendError(res, result.error);
        return;
      }

      if (!result.data) {
        res.status(404).json({ error: "File not found" });
        return;
      }

      res.json(result.data);
    } catch (error) {
      handleException(res, error, logger, "Failed to get file info");
    }
  };
}

/**
 * GET /api/v1/files/presigned-url?key=&expiresIn= (S3 only)
 */
export function presignedUrlHandler(ctx: DataContext) {
  return async (req: Request, res: Response): Promise<void> => {
    try {
      const { key, expiresIn } = presignQuery.parse(req.query);
      const result = await createPresignedUrl(ctx, key, expiresIn);

      if (!result.success) {
        sendError(res, result.error);
        return;
      }

      res.json({ url: result.data, expiresIn });
    } catch (error) {
      handleException(res, error, logger, "Failed to create presigned URL");
    }
  };
}

/**
 * GET /api/v1/files/raw/<key> - Serve a stored file
 */
export function serveFileHandler(ctx: DataContext) {
  return async (req: Request, res: Response): Promise<void> => {
    try {
      // Decoded by the router; a malformed escape never reaches here
      const key = req.params[0] ?? "";

      if (ctx.storage.kind === "s3") {
        res.redirect(ctx.storage.publicUrl(key));
        return;
      }

      const result = await readStoredFile(ctx, key);

      if (!result.success) {
        sendError(res, result.error);
        return;
      }

      if (!result.data) {
        res.status(404).json({ error: "File not found" });
        return;
      }

      res
        .status(200)
        .type(result.data.contentType ?? "application/octet-stream")
        .send(result.data.body);
    } catch (error) {
      handleException(res, error, logger, "Failed to serve file");
    }
  };
}

/**
 * GET /api/v1/files/validate?filename=&size= - Check an upload before sending it
 */
export function validateFileHandler(ctx: DataContext) {
  return async (req: Request, res: Response): Promise<void> => {
    try {
      const { filename, size } = validateQuery.parse(req.query);
      res.json(validateFile(ctx, filename, size));
    } catch (error) {
      handleException(res, error, logger, "Failed to validate file");
    }
  };
}

/**
 * GET /api/v1/files/stats (admin)
 */
export function storageStatsHandler(ctx: DataContext) {
  return async (_req: Request, res: Response): Promise<void> => {
    try {
      const result = await getStorageStats(ctx);

      if (!result.success) {
        sendError(res, result.error);
        return;
      }

      res.json(result.data);
    } catch (error) {
      handleException(res, error, logger, "Failed to compute storage stats");
    }
  };
}

/**
 * POST /api/v1/files/cleanup?maxAgeDays=7 (admin) - Old files under temp/
 */
export function cleanupTempFilesHandler(ctx: DataContext) {
  return async (req: Request, res: Response): Promise<void> => {
    try {
      const { maxAgeDays } = cleanupQuery.parse(req.query);
      const result = await cleanupTempFiles(ctx, maxAgeDays);

      if (!result.success) {
        sendError(res, result.error);
        return;
      }

      res.json(result.data);
    } catch (error) {
      handleException(res, error, logger, "Failed to clean up temp files");
    }
  };
}

/**
 * POST /api/v1/files/cleanup/orphaned (admin)
 */
export function cleanupOrphanedFilesHandler(ctx: DataContext) {
  return async (_req: Request, res: Response): Promise<void> => {
    try {
      const result = await cleanupOrphanedFiles(ctx);

      if (!result.success) {
        sendError(res, result.error);
        return;
      }

      res.json(result.data);
    } catch (error) {
      handleException(res, error, logger, "Failed to clean up orphaned files");
    }
  };
}

/**
 * POST /api/v1/files/cleanup/full?maxAgeDays=7 (admin)
 */
export function fullCleanupHandler(ctx: DataContext) {
  return async (req: Request, res: Response): Promise<void> => {
    try {
      const { maxAgeDays } = cleanupQuery.parse(req.query);
      const result = await fullCleanup(ctx, maxAgeDays);

      if (!result.success) {
        sendError(res, result.error);
        return;
      }

      res.json(result.data);
    } catch (error) {
      handleException(res, error, logger, "Failed to clean up files");
    }
  };
}
