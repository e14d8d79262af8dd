import { Router } from "express";
import type { DataContext } from "../domain/data-context.js";
import { optionalAuth, requireAdmin } from "../lib/auth/index.js";
import { listArticlesHandler } from "../handlers/articles/list-articles.js";
import {
  getArticleBySlugHandler,
  getArticleHandler,
} from "../handlers/articles/get-article.js";
import { createArticleHandler } from "../handlers/articles/create-article.js";
import { updateArticleHandler } from "../handlers/articles/update-article.js";
import { deleteArticleHandler } from "../handlers/articles/delete-article.js";

export function createArticlesRouter(ctx: DataContext): Router {
  const router = Router();
  const admin = requireAdmin(ctx);

  router.get("/", optionalAuth(ctx), listArticlesHandler(ctx));
  router.get("/slug/:slug", optionalAuth(ctx), getArticleBySlugHandler(ctx));
  router.get("/:id", optionalAuth(ctx), getArticleHandler(ctx));

  router.post("/", admin, createArticleHandler(ctx));
  router.put("/:id", admin, updateArticleHandler(ctx));
  router.delete("/:id", admin, deleteArticleHandler(ctx));

  return router;
}
