import { Router } from "express";
import type { DataContext } from "../domain/data-context.js";
import { requireAuth } from "../lib/auth/index.js";
import { loginHandler } from "../handlers/auth/login.js";
import { meHandler } from "../handlers/auth/me.js";
import { changePasswordHandler } from "../handlers/auth/change-password.js";

export function createAuthRouter(ctx: DataContext): Router {
  const router = Router();

  router.post("/login", loginHandler(ctx));
  // OAuth2 password flow form, as sent by the Swagger UI "Authorize" dialog
  router.post("/login/token", loginHandler(ctx));
  router.get("/me", requireAuth(ctx), meHandler());
  router.post("/change-password", requireAuth(ctx), changePasswordHandler(ctx));

  return router;
}
