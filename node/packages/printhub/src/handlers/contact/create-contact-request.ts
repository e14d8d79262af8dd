import { Request, Response } from "express";
import { z } from "zod";
import { createLogger } from "../../lib/logger/index.js";
import { handleException, sendError } from "../../lib/http/index.js";
import type { DataContext } from "../../domain/data-context.js";
import { createContactRequest } from "../../domain/contact/create-contact-request.js";

const logger = createLogger("printhub:handlers:contact:create");

export const createContactRequestSchema = z.object({
  name: z.string().min(1).max(100),
  email: z.string().email().max(200),
  phone: z.string().max(20).optional(),
  subject: z.string().min(1).max(200),
  message: z.string().min(1),
});

/**
 * POST /api/v1/contact - Public contact form
 */
export function createContactRequestHandler(ctx: DataContext) {
  return async (req: Request, res: Response): Promise<void> => {
    try {
      const input = createContactRequestSchema.parse(req.body);
      const result = await createContactRequest(ctx, input);

      if (!result.success) {
        sendError(res, result.error);
        return;
      }

      res.status(201).json(result.data);
    } catch (error) {
      handleException(res, error, logger, "Failed to create contact request");
    }
  };
}
