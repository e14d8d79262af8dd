import { v4 as uuidv4 } from "uuid";
import { Result, success, failure, toError } from "../../lib/core/index.js";
import { createLogger } from "../../lib/logger/index.js";
import type { ContactRequestDbRow } from "../../lib/db/index.js";
import type { DataContext } from "../data-context.js";
import type {
  ContactRequest,
  CreateContactRequestInput,
} from "../../types.js";
import { mapContactRequestFromDb } from "../../mappers.js";

const logger = createLogger("printhub:domain:contact");

export async function createContactRequest(
  ctx: DataContext,
  input: CreateContactRequestInput,
): Promise<Result<ContactRequest, Error>> {
  try {
    const now = Date.now();
    const row: ContactRequestDbRow = {
      id: uuidv4(),
      name: input.name,
      email: input.email,
      phone: input.phone ?? null,
      subject: input.subject,
      message: input.message,
      status: "new",
      admin_notes: null,
      created_at: now,
      updated_at: now,
    };

    await ctx.db("contact_request").insert(row);

    logger.info("Created contact request", { id: row.id });
    return success(mapContactRequestFromDb(row));
  } catch (error) {
    logger.error("Failed to create contact request", { error });
    return failure(toError(error));
  }
}
