import { Router } from "express";
import type { DataContext } from "../domain/data-context.js";
import { requireAdmin } from "../lib/auth/index.js";
import { listUsersHandler } from "../handlers/users/list-users.js";
import { getUserHandler } from "../handlers/users/get-user.js";
import { createUserHandler } from "../handlers/users/create-user.js";
import { updateUserHandler } from "../handlers/users/update-user.js";
import { deleteUserHandler } from "../handlers/users/delete-user.js";

export function createUsersRouter(ctx: DataContext): Router {
  const router = Router();

  router.use(requireAdmin(ctx));

  router.get("/", listUsersHandler(ctx));
  router.post("/", createUserHandler(ctx));
  router.get("/:id", getUserHandler(ctx));
  router.put("/:id", updateUserHandler(ctx));
  router.delete("/:id", deleteUserHandler(ctx));

  return router;
}
