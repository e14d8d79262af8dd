import { Router } from "express";
import type { DataContext } from "../domain/data-context.js";
import { requireAdmin } from "../lib/auth/index.js";
import {
  contentByGroupHandler,
  contentByKeysHandler,
  createContentBlockHandler,
  deleteContentBlockHandler,
  listContentBlocksHandler,
  listContentGroupsHandler,
  updateContentBlockHandler,
} from "../handlers/cms/content.js";
import {
  createPageHandler,
  deletePageHandler,
  getPageHandler,
  listPagesHandler,
  updatePageHandler,
} from "../handlers/cms/pages.js";

export function createCmsRouter(ctx: DataContext): Router {
  const router = Router();

  router.get("/content/by-keys", contentByKeysHandler(ctx));
  router.get("/content/by-group/:group", contentByGroupHandler(ctx));
  router.get("/pages/:slug", getPageHandler(ctx));

  const admin = Router();
  admin.use(requireAdmin(ctx));
  admin.get("/content", listContentBlocksHandler(ctx));
  admin.get("/content/groups", listContentGroupsHandler(ctx));
  admin.post("/content", createContentBlockHandler(ctx));
  admin.put("/content/:id", updateContentBlockHandler(ctx));
  admin.delete("/content/:id", deleteContentBlockHandler(ctx));
  admin.get("/pages", listPagesHandler(ctx));
  admin.post("/pages", createPageHandler(ctx));
  admin.put("/pages/:id", updatePageHandler(ctx));
  admin.delete("/pages/:id", deletePageHandler(ctx));
  router.use("/admin", admin);

  return router;
}
