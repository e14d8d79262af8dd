import { Request, Response } from "express";
import { z } from "zod";
import { createLogger } from "../../lib/logger/index.js";
import { handleException, sendError } from "../../lib/http/index.js";
import type { DataContext } from "../../domain/data-context.js";
import {
  deleteContactRequest,
  updateContactRequest,
} from "../../domain/contact/update-contact-request.js";
import type { UpdateContactRequestInput } from "../../types.js";
import { contactStatusSchema } from "./list-contact-requests.js";

const logger = createLogger("printhub:handlers:contact:update");

export const updateContactRequestSchema = z.object({
  name: z.string().min(1).max(100).optional(),
  email: z.string().email().max(200).optional(),
  phone: z.string().max(20).nullable().optional(),
  subject: z.string().min(1).max(200).optional(),
  message: z.string().min(1).optional(),
  status: contactStatusSchema.optional(),
  adminNotes: z.string().nullable().optional(),
});

export const contactStatusBodySchema = z.object({
  status: contactStatusSchema,
});

export const contactNotesBodySchema = z.object({
  adminNotes: z.string().nullable(),
});

function contactUpdateHandler(
  ctx: DataContext,
  toInput: (body: unknown) => UpdateContactRequestInput,
) {
  return async (req: Request<{ id: string }>, res: Response): Promise<void> => {
    try {
      const result = await updateContactRequest(
        ctx,
        req.params.id,
        toInput(req.body),
      );

      if (!result.success) {
        sendError(res, result.error);
        return;
      }

      res.json(result.data);
    } catch (error) {
      handleException(res, error, logger, "Error updating contact request", {
        id: req.params.id,
      });
    }
  };
}

/**
 * PUT /api/v1/contact/admin/:id
 */
export function updateContactRequestHandler(ctx: DataContext) {
  return contactUpdateHandler(ctx, (body) =>
    updateContactRequestSchema.parse(body),
  );
}

/**
 * PUT /api/v1/contact/admin/:id/status
 */
export function updateContactStatusHandler(ctx: DataContext) {
  return contactUpdateHandler(ctx, (body) => contactStatusBodySchema.parse(body));
}

/**
 * PUT /api/v1/contact/admin/:id/notes
 */
export function updateContactNotesHandler(ctx: DataContext) {
  return contactUpdateHandler(ctx, (body) => contactNotesBodySchema.parse(body));
}

/**
 * DELETE /api/v1/contact/admin/:id
 */
export function deleteContactRequestHandler(ctx: DataContext) {
  return async (req: Request<{ id: string }>, res: Response): Promise<void> => {
    try {
      const result = await deleteContactRequest(ctx, req.params.id);

      if (!result.success) {
        sendError(res, result.error);
        return;
      }

      res.status(204).end();
    } catch (error) {
      handleException(res, error, logger, "Error deleting contact request", {
        id: req.params.id,
      });
    }
  };
}
