/**
 * Domain errors carried in failed Results.
 * Handlers translate them to HTTP status codes via `statusForError`.
 */

export class NotFoundError extends Error {
  constructor(entity: string, id?: string) {
    super(id ? `${entity} not found: ${id}` : `${entity} not found`);
    this.name = "NotFoundError";
  }
}

export class ConflictError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConflictError";
  }
}

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

export class AuthError extends Error {
  constructor(message = "Not authenticated") {
    super(message);
    this.name = "AuthError";
  }
}

export class ForbiddenError extends Error {
  constructor(message = "Not enough permissions") {
    super(message);
    this.name = "ForbiddenError";
  }
}

export function statusForError(error: Error): number {
  if (error instanceof NotFoundError) return 404;
  if (error instanceof ConflictError) return 409;
  if (error instanceof ValidationError) return 400;
  if (error instanceof AuthError) return 401;
  if (error instanceof ForbiddenError) return 403;
  return 500;
}

/**
 * Normalize a caught value into an Error instance
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
