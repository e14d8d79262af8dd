import type { Response } from "express";
import { z } from "zod";
import { statusForError } from "../core/index.js";
import type { Logger } from "../logger/index.js";

/**
 * Answer with the status a domain error maps to. Unexpected errors are
 * reported without their message.
 */
export function sendError(res: Response, error: Error): void {
  const status = statusForError(error);
  res
    .status(status)
    .json({ error: status === 500 ? "Internal server error" : error.message });
}

/**
 * Shared catch block for handlers: invalid input is a 400 with the zod
 * issues, anything else is logged and answered with a 500.
 */
export function handleException(
  res: Response,
  error: unknown,
  logger: Logger,
  message: string,
  meta: Record<string, unknown> = {},
): void {
  if (error instanceof z.ZodError) {
    res.status(400).json({ error: "Invalid request", details: error.errors });
    return;
  }
  logger.error(message, { ...meta, error });
  res.status(500).json({ error: "Internal server error" });
}
