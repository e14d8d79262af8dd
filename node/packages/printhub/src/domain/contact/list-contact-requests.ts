import { Result, success, failure, toError } from "../../lib/core/index.js";
import { createLogger } from "../../lib/logger/index.js";
import {
  countRows,
  whereContains,
  type ContactRequestDbRow,
} from "../../lib/db/index.js";
import type { DataContext } from "../data-context.js";
import type {
  ContactRequest,
  ContactStatus,
  PaginatedResult,
} from "../../types.js";
import { mapContactRequestFromDb } from "../../mappers.js";

const logger = createLogger("printhub:domain:contact");

export type ListContactRequestsParams = {
  status?: ContactStatus;
  email?: string;
  search?: string;
  // epoch ms; only requests created at or after it
  since?: number;
  limit?: number;
  offset?: number;
};

export async function listContactRequests(
  ctx: DataContext,
  params: ListContactRequestsParams = {},
): Promise<Result<PaginatedResult<ContactRequest>, Error>> {
  try {
    const limit = params.limit ?? 100;
    const offset = params.offset ?? 0;

    const query = ctx.db<ContactRequestDbRow>("contact_request");
    if (params.status) query.where("status", params.status);
    if (params.email) {
      query.whereRaw("lower(email) = ?", [params.email.toLowerCase()]);
    }
    if (params.since !== undefined) query.where("created_at", ">=", params.since);
    if (params.search) {
      whereContains(query, ["name", "email", "subject", "message"], params.search);
    }

    const total = await countRows(query);
    const rows: ContactRequestDbRow[] = await query
      .clone()
      .orderBy("created_at", "desc")
      .limit(limit)
      .offset(offset);

    return success({
      data: rows.map(mapContactRequestFromDb),
      pagination: { total, limit, offset },
    });
  } catch (error) {
    logger.error("Failed to list contact requests", { error });
    return failure(toError(error));
  }
}

export async function getContactRequest(
  ctx: DataContext,
  id: string,
): Promise<Result<ContactRequest | null, Error>> {
  try {
    const row = await ctx
      .db<ContactRequestDbRow>("contact_request")
      .where("id", id)
      .first();
    return success(row ? mapContactRequestFromDb(row) : null);
  } catch (error) {
    logger.error("Failed to get contact request", { error, id });
    return failure(toError(error));
  }
}
