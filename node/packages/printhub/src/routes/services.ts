import { Router } from "express";
import type { DataContext } from "../domain/data-context.js";
import { requireAdmin } from "../lib/auth/index.js";
import { listServicesHandler } from "../handlers/services/list-services.js";
import { searchServicesHandler } from "../handlers/services/search-services.js";
import { getServiceHandler } from "../handlers/services/get-service.js";
import { createServiceHandler } from "../handlers/services/create-service.js";
import {
  setServiceActiveHandler,
  updateServiceHandler,
} from "../handlers/services/update-service.js";
import { deleteServiceHandler } from "../handlers/services/delete-service.js";

export function createServicesRouter(ctx: DataContext): Router {
  const router = Router();
  const admin = requireAdmin(ctx);

  router.get("/", listServicesHandler(ctx));
  router.get("/search", searchServicesHandler(ctx));
  router.get("/:id", getServiceHandler(ctx));

  router.post("/", admin, createServiceHandler(ctx));
  router.put("/:id", admin, updateServiceHandler(ctx));
  router.delete("/:id", admin, deleteServiceHandler(ctx));
  router.post("/:id/activate", admin, setServiceActiveHandler(ctx, true));
  router.put("/:id/deactivate", admin, setServiceActiveHandler(ctx, false));

  return router;
}
