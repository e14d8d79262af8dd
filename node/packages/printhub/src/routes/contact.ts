import { Router } from "express";
import type { DataContext } from "../domain/data-context.js";
import { requireAdmin } from "../lib/auth/index.js";
import { createContactRequestHandler } from "../handlers/contact/create-contact-request.js";
import {
  contactStatsHandler,
  getContactRequestHandler,
  listContactRequestsByEmailHandler,
  listContactRequestsHandler,
  listContactRequestsWithStatusHandler,
  listRecentContactRequestsHandler,
  searchContactRequestsHandler,
} from "../handlers/contact/list-contact-requests.js";
import {
  deleteContactRequestHandler,
  updateContactNotesHandler,
  updateContactRequestHandler,
  updateContactStatusHandler,
} from "../handlers/contact/update-contact-request.js";

export function createContactRouter(ctx: DataContext): Router {
  const router = Router();

  const admin = Router();
  admin.use(requireAdmin(ctx));
  admin.get("/", listContactRequestsHandler(ctx));
  admin.get("/stats", contactStatsHandler(ctx));
  admin.get("/search", searchContactRequestsHandler(ctx));
  admin.get("/new", listContactRequestsWithStatusHandler(ctx, "new"));
  admin.get("/in-progress", listContactRequestsWithStatusHandler(ctx, "in_progress"));
  admin.get("/recent", listRecentContactRequestsHandler(ctx));
  admin.get("/by-email/:email", listContactRequestsByEmailHandler(ctx));
  admin.get("/:id", getContactRequestHandler(ctx));
  admin.put("/:id", updateContactRequestHandler(ctx));
  admin.put("/:id/status", updateContactStatusHandler(ctx));
  admin.put("/:id/notes", updateContactNotesHandler(ctx));
  admin.delete("/:id", deleteContactRequestHandler(ctx));
  router.use("/admin", admin);

  router.post("/", createContactRequestHandler(ctx));

  return router;
}
