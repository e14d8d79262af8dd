import { Router } from "express";
import type { DataContext } from "../domain/data-context.js";
import { requireAdmin } from "../lib/auth/index.js";
import {
  createSettingHandler,
  deleteSettingHandler,
  listSettingsHandler,
  publicSettingsHandler,
  updateSettingHandler,
} from "../handlers/settings/settings.js";

/**
 * Mounted at /api/v1/content
 */
export function createSettingsRouter(ctx: DataContext): Router {
  const router = Router();
  const admin = requireAdmin(ctx);

  router.get("/settings/public", publicSettingsHandler(ctx));

  router.get("/admin/settings", admin, listSettingsHandler(ctx));
  router.post("/admin/settings", admin, createSettingHandler(ctx));
  router.put("/admin/settings/:key", admin, updateSettingHandler(ctx));
  router.delete("/admin/settings/:key", admin, deleteSettingHandler(ctx));

  return router;
}
