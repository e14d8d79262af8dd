import { v4 as uuidv4 } from "uuid";
import {
  Result,
  success,
  failure,
  ValidationError,
  toError,
} from "../../lib/core/index.js";
import { createLogger } from "../../lib/logger/index.js";
import { toJson, type OrderDbRow, type ServiceDbRow } from "../../lib/db/index.js";
import { notifyNewOrder } from "../../lib/notifications/index.js";
import type { DataContext } from "../data-context.js";
import type { CreateOrderInput, Order } from "../../types.js";
import { mapOrderFromDb } from "../../mappers.js";

const logger = createLogger("printhub:domain:order");

/**
 * Place an order for an existing service. The customer email falls back to
 * the free-form contact when omitted. A `new_order` notification is sent in
 * the background.
 */
export async function createOrder(
  ctx: DataContext,
  input: CreateOrderInput,
): Promise<Result<Order, Error>> {
  try {
    const service = await ctx
      .db<ServiceDbRow>("service")
      .where("id", input.serviceId)
      .first();
    if (!service) {
      return failure(new ValidationError("Service not found"));
    }

    const customerEmail = input.customerEmail ?? input.customerContact;
    if (!customerEmail) {
      return failure(
        new ValidationError("Either customerEmail or customerContact is required"),
      );
    }

    const now = Date.now();
    const row: OrderDbRow = {
      id: uuidv4(),
      customer_name: input.customerName,
      customer_email: customerEmail,
      customer_phone: input.customerPhone ?? null,
      customer_contact: input.customerContact ?? null,
      alternative_contact: input.alternativeContact ?? null,
      service_id: input.serviceId,
      customer_id: input.customerId ?? null,
      specifications: toJson(input.specifications),
      status: "new",
      total_price: null,
      source: input.source,
      notes: input.notes ?? null,
      delivery_needed: input.deliveryNeeded ?? null,
      delivery_details: input.deliveryDetails ?? null,
      created_at: now,
      updated_at: now,
    };

    await ctx.db("order").insert(row);

    const order = mapOrderFromDb(row);
    logger.info("Created order", { id: order.id, source: order.source });

    notifyNewOrder(ctx.notifier, order).catch((error: unknown) => {
      logger.error("New order notification failed", { id: order.id, error });
    });

    return success(order);
  } catch (error) {
    logger.error("Failed to create order", { error });
    return failure(toError(error));
  }
}
