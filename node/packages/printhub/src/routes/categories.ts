import { Router } from "express";
import type { DataContext } from "../domain/data-context.js";
import { requireAdmin } from "../lib/auth/index.js";
import {
  listCategoriesHandler,
  searchCategoriesHandler,
} from "../handlers/categories/list-categories.js";
import {
  getCategoryBySlugHandler,
  getCategoryHandler,
} from "../handlers/categories/get-category.js";
import { createCategoryHandler } from "../handlers/categories/create-category.js";
import {
  setCategoryActiveHandler,
  updateCategoryHandler,
} from "../handlers/categories/update-category.js";

export function createCategoriesRouter(ctx: DataContext): Router {
  const router = Router();
  const admin = requireAdmin(ctx);

  router.get("/", listCategoriesHandler(ctx));
  router.get("/search", searchCategoriesHandler(ctx));
  router.get("/slug/:slug", getCategoryBySlugHandler(ctx));
  router.get("/:id", getCategoryHandler(ctx));

  router.post("/", admin, createCategoryHandler(ctx));
  router.put("/:id", admin, updateCategoryHandler(ctx));
  router.delete("/:id", admin, setCategoryActiveHandler(ctx, false));
  router.post("/:id/activate", admin, setCategoryActiveHandler(ctx, true));

  return router;
}
