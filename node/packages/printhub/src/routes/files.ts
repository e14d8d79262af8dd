import { Router } from "express";
import type { DataContext } from "../domain/data-context.js";
import { requireAdmin } from "../lib/auth/index.js";
import { createUpload } from "../lib/http/index.js";
import {
  cleanupOrphanedFilesHandler,
  cleanupTempFilesHandler,
  deleteFileHandler,
  fileInfoHandler,
  fullCleanupHandler,
  listFilesHandler,
  presignedUrlHandler,
  serveFileHandler,
  storageStatsHandler,
  uploadFileHandler,
  validateFileHandler,
} from "../handlers/files/files.js";

export function createFilesRouter(ctx: DataContext): Router {
  const router = Router();
  const admin = requireAdmin(ctx);
  const upload = createUpload(ctx.config);

  router.get("/raw/*", serveFileHandler(ctx));

  router.post("/upload", admin, upload.single("file"), uploadFileHandler(ctx));
  router.delete("/", admin, deleteFileHandler(ctx));
  router.get("/list", admin, listFilesHandler(ctx));
  router.get("/info", admin, fileInfoHandler(ctx));
  router.get("/presigned-url", admin, presignedUrlHandler(ctx));
  router.get("/validate", validateFileHandler(ctx));
  router.get("/stats", admin, storageStatsHandler(ctx));
  router.post("/cleanup", admin, cleanupTempFilesHandler(ctx));
  router.post("/cleanup/orphaned", admin, cleanupOrphanedFilesHandler(ctx));
  router.post("/cleanup/full", admin, fullCleanupHandler(ctx));

  return router;
}
