import { Router } from "express";
import {
  telegramNotificationHandler,
  telegramWebhookHealthHandler,
} from "../handlers/webhooks/telegram.js";

export function createWebhooksRouter(): Router {
  const router = Router();

  router.post("/telegram/notifications", telegramNotificationHandler());
  router.get("/telegram/health", telegramWebhookHealthHandler());

  return router;
}
