import { Router } from "express";
import type { DataContext } from "../domain/data-context.js";
import { optionalAuth, requireAdmin } from "../lib/auth/index.js";
import { createUpload } from "../lib/http/index.js";
import { createOrderHandler } from "../handlers/orders/create-order.js";
import {
  listOrdersHandler,
  searchOrdersHandler,
} from "../handlers/orders/list-orders.js";
import { getOrderHandler } from "../handlers/orders/get-order.js";
import {
  orderStatusChangeWebhookHandler,
  updateOrderHandler,
} from "../handlers/orders/update-order.js";
import { deleteOrderHandler } from "../handlers/orders/delete-order.js";
import { uploadOrderFilesHandler } from "../handlers/orders/upload-files.js";

export function createOrdersRouter(ctx: DataContext): Router {
  const router = Router();
  const admin = requireAdmin(ctx);
  const upload = createUpload(ctx.config);

  router.post("/", optionalAuth(ctx), createOrderHandler(ctx));
  router.get("/search", searchOrdersHandler(ctx));
  router.post(
    "/:id/files",
    upload.array("files", 10),
    uploadOrderFilesHandler(ctx),
  );

  router.post(
    "/webhook/status-change",
    admin,
    orderStatusChangeWebhookHandler(ctx),
  );
  router.get("/", admin, listOrdersHandler(ctx));
  router.get("/:id", admin, getOrderHandler(ctx));
  router.put("/:id", admin, updateOrderHandler(ctx));
  router.delete("/:id", admin, deleteOrderHandler(ctx));

  return router;
}
