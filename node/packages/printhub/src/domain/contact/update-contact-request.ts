import {
  Result,
  success,
  failure,
  NotFoundError,
  toError,
} from "../../lib/core/index.js";
import { createLogger } from "../../lib/logger/index.js";
import type { ContactRequestDbRow } from "../../lib/db/index.js";
import type { DataContext } from "../data-context.js";
import type {
  ContactRequest,
  UpdateContactRequestInput,
} from "../../types.js";
import { mapContactRequestFromDb } from "../../mappers.js";

const logger = createLogger("printhub:domain:contact");

export async function updateContactRequest(
  ctx: DataContext,
  id: string,
  input: UpdateContactRequestInput,
): Promise<Result<ContactRequest, Error>> {
  try {
    const existing = await ctx
      .db<ContactRequestDbRow>("contact_request")
      .where("id", id)
      .first();
    if (!existing) {
      return failure(new NotFoundError("Contact request", id));
    }

    const changes: Partial<ContactRequestDbRow> = { updated_at: Date.now() };
    if (input.name !== undefined) changes.name = input.name;
    if (input.email !== undefined) changes.email = input.email;
    if (input.phone !== undefined) changes.phone = input.phone;
    if (input.subject !== undefined) changes.subject = input.subject;
    if (input.message !== undefined) changes.message = input.message;
    if (input.status !== undefined) changes.status = input.status;
    if (input.adminNotes !== undefined) changes.admin_notes = input.adminNotes;

    await ctx.db("contact_request").where("id", id).update(changes);

    logger.info("Updated contact request", { id, status: input.status });
    return success(mapContactRequestFromDb({ ...existing, ...changes }));
  } catch (error) {
    logger.error("Failed to update contact request", { error, id });
    return failure(toError(error));
  }
}

export async function deleteContactRequest(
  ctx: DataContext,
  id: string,
): Promise<Result<void, Error>> {
  try {
    const deleted = await ctx.db("contact_request").where("id", id).delete();
    if (deleted === 0) {
      return failure(new NotFoundError("Contact request", id));
    }
    logger.info("Deleted contact request", { id });
    return success(undefined);
  } catch (error) {
    logger.error("Failed to delete contact request", { error, id });
    return failure(toError(error));
  }
}
