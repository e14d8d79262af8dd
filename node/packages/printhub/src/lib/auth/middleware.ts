/**
 * Express authentication middleware.
 *
 *   requireAuth  - 401 unless a valid bearer token of an active user is sent
 *   optionalAuth - attaches the user when a valid token is sent, never rejects
 *   requireAdmin - requireAuth plus role "admin", 403 otherwise
 */

import type { Request, Response, NextFunction, RequestHandler } from "express";
import { createLogger } from "../logger/index.js";
import { verifyAccessToken } from "./tokens.js";
import type { DataContext } from "../../domain/data-context.js";
import { getUser } from "../../domain/user/get-user.js";
import type { User } from "../../types.js";

declare global {
  namespace Express {
    interface Request {
      user?: User;
    }
  }
}

const logger = createLogger("printhub:auth");

function bearerToken(req: Request): string | null {
  const header = req.headers.authorization;
  if (!header || !header.toLowerCase().startsWith("bearer ")) {
    return null;
  }
  const token = header.slice(7).trim();
  return token.length > 0 ? token : null;
}

type Resolution =
  | { kind: "anonymous" }
  | { kind: "invalid" }
  | { kind: "user"; user: User };

async function resolveUser(ctx: DataContext, req: Request): Promise<Resolution> {
  const token = bearerToken(req);
  if (!token) {
    return { kind: "anonymous" };
  }

  const payload = await verifyAccessToken(token, ctx.config.auth.secretKey);
  if (!payload) {
    return { kind: "invalid" };
  }

  const result = await getUser(ctx, payload.userId);
  if (!result.success) {
    throw result.error;
  }
  if (!result.data || !result.data.isActive) {
    return { kind: "invalid" };
  }
  return { kind: "user", user: result.data };
}

function unauthorized(res: Response): void {
  res
    .status(401)
    .set("WWW-Authenticate", "Bearer")
    .json({ error: "Could not validate credentials" });
}

export function requireAuth(ctx: DataContext): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    resolveUser(ctx, req)
      .then((resolution) => {
        if (resolution.kind !== "user") {
          unauthorized(res);
          return;
        }
        req.user = resolution.user;
        next();
      })
      .catch((error: unknown) => {
        logger.error("Authentication failed", { error });
        next(error);
      });
  };
}

export function optionalAuth(ctx: DataContext): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction): void => {
    resolveUser(ctx, req)
      .then((resolution) => {
        if (resolution.kind === "user") {
          req.user = resolution.user;
        }
        next();
      })
      .catch((error: unknown) => {
        logger.error("Optional authentication failed", { error });
        next(error);
      });
  };
}

export function requireAdmin(ctx: DataContext): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    resolveUser(ctx, req)
      .then((resolution) => {
        if (resolution.kind !== "user") {
          unauthorized(res);
          return;
        }
        if (resolution.user.role !== "admin") {
          res.status(403).json({ error: "Not enough permissions" });
          return;
        }
        req.user = resolution.user;
        next();
      })
      .catch((error: unknown) => {
        logger.error("Authentication failed", { error });
        next(error);
      });
  };
}

export function isAdmin(req: Request): boolean {
  return req.user?.role === "admin";
}
