import { Request, Response } from "express";
import { z } from "zod";
import { createLogger } from "../../lib/logger/index.js";
import { handleException } from "../../lib/http/index.js";
import { isNotificationType } from "../../lib/notifications/index.js";

const logger = createLogger("printhub:handlers:webhooks:telegram");

// Same envelope WebhookNotifier posts
export const telegramNotificationSchema = z.object({
  type: z.string().min(1),
  data: z.record(z.unknown()),
  timestamp: z.string().min(1),
});

/**
 * POST /api/v1/webhooks/telegram/notifications
 */
export function telegramNotificationHandler() {
  return async (req: Request, res: Response): Promise<void> => {
    try {
      const { type, data } = telegramNotificationSchema.parse(req.body);

      if (!isNotificationType(type)) {
        logger.warn("Unknown notification type", { type });
        res.status(400).json({ error: `Unknown notification type: ${type}` });
        return;
      }

      logger.info("Telegram notification received", {
        type,
        orderId: data.id,
        status: type === "status_change" ? data.status : undefined,
      });

      res.json({
        success: true,
        message: `Notification ${type} processed successfully`,
        processedAt: new Date().toISOString(),
      });
    } catch (error) {
      handleException(res, error, logger, "Error processing Telegram webhook");
    }
  };
}

/**
 * GET /api/v1/webhooks/telegram/health
 */
export function telegramWebhookHealthHandler() {
  return (_req: Request, res: Response): void => {
    res.json({
      status: "healthy",
      service: "telegram_webhook",
      timestamp: new Date().toISOString(),
    });
  };
}
