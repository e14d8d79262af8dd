/**
 * Order notifications delivered to a Telegram bot through its webhook.
 * Delivery never fails the request that triggered it: errors are logged
 * and reported as `false`.
 */

import { createLogger } from "../logger/index.js";
import type { Order } from "../../types.js";

const logger = createLogger("printhub:notifications");

export const NOTIFICATION_TYPES = ["new_order", "status_change", "test"] as const;

export type NotificationType = (typeof NOTIFICATION_TYPES)[number];

export function isNotificationType(value: string): value is NotificationType {
  return NOTIFICATION_TYPES.some((type) => type === value);
}

export interface Notifier {
  readonly enabled: boolean;
  notify(type: NotificationType, data: object): Promise<boolean>;
}

export type FetchFn = (
  input: string,
  init: RequestInit,
) => Promise<Pick<Response, "ok" | "status">>;

export class WebhookNotifier implements Notifier {
  readonly enabled = true;

  constructor(
    private url: string,
    private timeoutMs: number = 10_000,
    private fetchFn: FetchFn = fetch,
  ) {}

  async notify(type: NotificationType, data: object): Promise<boolean> {
    const payload = {
      type,
      data,
      timestamp: new Date().toISOString(),
    };

    try {
      const response = await this.fetchFn(this.url, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(payload),
        signal: AbortSignal.timeout(this.timeoutMs),
      });

      if (!response.ok) {
        logger.error("Webhook notification failed", {
          type,
          status: response.status,
        });
        return false;
      }

      logger.info("Webhook notification sent", { type });
      return true;
    } catch (error) {
      logger.error("Failed to send webhook notification", { type, error });
      return false;
    }
  }
}

export class DisabledNotifier implements Notifier {
  readonly enabled = false;

  async notify(type: NotificationType, _data?: object): Promise<boolean> {
    logger.debug("Notifications disabled, skipping", { type });
    return false;
  }
}

export function createNotifier(webhookUrl: string): Notifier {
  if (!webhookUrl) {
    logger.info("Telegram notifications disabled - no webhook URL configured");
    return new DisabledNotifier();
  }
  return new WebhookNotifier(webhookUrl);
}

export function notifyNewOrder(notifier: Notifier, order: Order): Promise<boolean> {
  return notifier.notify("new_order", order);
}

/**
 * Status changes go back to the customer only for orders placed via Telegram
 */
export async function notifyStatusChange(
  notifier: Notifier,
  order: Order,
): Promise<boolean> {
  if (order.source !== "telegram") {
    return false;
  }
  return notifier.notify("status_change", order);
}
