import multer from "multer";
import type { Request } from "express";
import type { Config } from "../../config.js";

/**
 * Multipart parsing into memory; the size limit is enforced by multer and
 * answered with 413 by the app's error handler.
 */
export function createUpload(config: Config): multer.Multer {
  return multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: config.storage.maxFileSize },
  });
}

export function uploadedFiles(req: Request): Express.Multer.File[] {
  if (Array.isArray(req.files)) return req.files;
  if (req.files) return Object.values(req.files).flat();
  return [];
}
