import { Result, success, failure, toError } from "../../lib/core/index.js";
import { createLogger } from "../../lib/logger/index.js";
import { countRows, type ContactRequestDbRow } from "../../lib/db/index.js";
import type { DataContext } from "../data-context.js";
import type { ContactStats, ContactStatus } from "../../types.js";

const logger = createLogger("printhub:domain:contact");

const STATUSES: ContactStatus[] = ["new", "in_progress", "resolved", "closed"];
const RECENT_WINDOW_MS = 7 * 24 * 60 * 60 * 1000;

export async function getContactStats(
  ctx: DataContext,
  now: number = Date.now(),
): Promise<Result<ContactStats, Error>> {
  try {
    const table = () => ctx.db<ContactRequestDbRow>("contact_request");

    const totalRequests = await countRows(table());
    const recentRequests = await countRows(
      table().where("created_at", ">=", now - RECENT_WINDOW_MS),
    );

    const statusDistribution: Record<ContactStatus, number> = {
      new: 0,
      in_progress: 0,
      resolved: 0,
      closed: 0,
    };
    for (const status of STATUSES) {
      statusDistribution[status] = await countRows(
        table().where("status", status),
      );
    }

    return success({ totalRequests, recentRequests, statusDistribution });
  } catch (error) {
    logger.error("Failed to compute contact stats", { error });
    return failure(toError(error));
  }
}
