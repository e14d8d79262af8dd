import { Router } from "express";
import type { DataContext } from "../domain/data-context.js";
import { requireAdmin } from "../lib/auth/index.js";
import { createUpload } from "../lib/http/index.js";
import {
  listComplexityLevelsHandler,
  listFeaturedProjectsHandler,
  listProjectCategoriesHandler,
  listProjectsHandler,
} from "../handlers/projects/list-projects.js";
import {
  downloadProjectStlHandler,
  getProjectHandler,
} from "../handlers/projects/get-project.js";
import { createProjectHandler } from "../handlers/projects/create-project.js";
import { updateProjectHandler } from "../handlers/projects/update-project.js";
import { deleteProjectHandler } from "../handlers/projects/delete-project.js";
import {
  uploadProjectImagesHandler,
  uploadProjectStlHandler,
} from "../handlers/projects/upload-files.js";

export function createProjectsRouter(ctx: DataContext): Router {
  const router = Router();
  const admin = requireAdmin(ctx);
  const upload = createUpload(ctx.config);

  router.get("/", listProjectsHandler(ctx));
  router.get("/featured", listFeaturedProjectsHandler(ctx));
  router.get("/categories", listProjectCategoriesHandler(ctx));
  router.get("/complexity-levels", listComplexityLevelsHandler());
  router.get("/:id", getProjectHandler(ctx));
  router.get("/:id/stl", downloadProjectStlHandler(ctx));

  router.post("/", admin, createProjectHandler(ctx));
  router.put("/:id", admin, updateProjectHandler(ctx));
  router.delete("/:id", admin, deleteProjectHandler(ctx));
  router.post(
    "/:id/stl",
    admin,
    upload.single("file"),
    uploadProjectStlHandler(ctx),
  );
  router.post(
    "/:id/images",
    admin,
    upload.array("files", 20),
    uploadProjectImagesHandler(ctx),
  );

  return router;
}
