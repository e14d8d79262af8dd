import { Router } from "express";
import type { DataContext } from "../domain/data-context.js";
import { requireAdmin } from "../lib/auth/index.js";
import {
  getColorHandler,
  listColorsByTypeHandler,
  listColorsHandler,
  listColorTypesHandler,
} from "../handlers/colors/list-colors.js";
import {
  createColorHandler,
  deleteColorHandler,
  toggleColorFlagHandler,
  updateColorHandler,
} from "../handlers/colors/write-color.js";

export function createColorsRouter(ctx: DataContext): Router {
  const router = Router();
  const admin = requireAdmin(ctx);

  router.get("/types", listColorTypesHandler());
  router.get("/", listColorsHandler(ctx));
  router.get("/by-type/:type", listColorsByTypeHandler(ctx));
  router.get("/:id", getColorHandler(ctx));

  router.post("/", admin, createColorHandler(ctx));
  router.put("/:id", admin, updateColorHandler(ctx));
  router.delete("/:id", admin, deleteColorHandler(ctx));
  router.patch(
    "/:id/toggle-active",
    admin,
    toggleColorFlagHandler(ctx, "isActive"),
  );
  router.patch("/:id/toggle-new", admin, toggleColorFlagHandler(ctx, "isNew"));

  return router;
}
