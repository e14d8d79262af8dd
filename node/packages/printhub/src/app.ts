/**
 * Express application factory. Builds the full app around a DataContext
 * without listening, so the server binary and tests share it.
 */

import express, { type Express } from "express";
import cors from "cors";
import multer from "multer";
import { createLogger } from "./lib/logger/index.js";
import type { DataContext } from "./domain/data-context.js";
import { createHealthRouter } from "./routes/health.js";
import { createDocsRouter } from "./routes/docs.js";
import { createAuthRouter } from "./routes/auth.js";
import { createUsersRouter } from "./routes/users.js";
import { createServicesRouter } from "./routes/services.js";
import { createCategoriesRouter } from "./routes/categories.js";
import { createProjectsRouter } from "./routes/projects.js";
import { createOrdersRouter } from "./routes/orders.js";
import { createArticlesRouter } from "./routes/articles.js";
import { createColorsRouter } from "./routes/colors.js";
import { createReviewsRouter } from "./routes/reviews.js";
import { createContactRouter } from "./routes/contact.js";
import { createCmsRouter } from "./routes/cms.js";
import { createSettingsRouter } from "./routes/settings.js";
import { createFilesRouter } from "./routes/files.js";
import { createCacheRouter } from "./routes/cache.js";
import { createWebhooksRouter } from "./routes/webhooks.js";

const logger = createLogger("printhub:server");

export function corsOrigin(allowedOrigins: string[]): boolean | string[] {
  return allowedOrigins.includes("*") ? true : allowedOrigins;
}

export function createApp(ctx: DataContext): Express {
  const app = express();

  app.disable("x-powered-by");
  app.use(
    cors({
      origin: corsOrigin(ctx.config.cors.allowedOrigins),
      credentials: true,
    }),
  );

  // Request parsing
  app.use(express.json({ limit: "10mb" }));
  app.use(express.urlencoded({ extended: true }));

  // Request logging
  app.use((req, _res, next) => {
    logger.debug("Request received", {
      method: req.method,
      url: req.url,
      ip: req.ip,
    });
    next();
  });

  app.use(createHealthRouter(ctx));
  app.use(createDocsRouter(ctx));

  // API routes
  app.use("/api/v1/auth", createAuthRouter(ctx));
  app.use("/api/v1/users", createUsersRouter(ctx));
  app.use("/api/v1/services", createServicesRouter(ctx));
  app.use("/api/v1/categories", createCategoriesRouter(ctx));
  app.use("/api/v1/projects", createProjectsRouter(ctx));
  app.use("/api/v1/orders", createOrdersRouter(ctx));
  app.use("/api/v1/articles", createArticlesRouter(ctx));
  app.use("/api/v1/colors", createColorsRouter(ctx));
  app.use("/api/v1/reviews", createReviewsRouter(ctx));
  app.use("/api/v1/contact", createContactRouter(ctx));
  app.use("/api/v1/cms", createCmsRouter(ctx));
  app.use("/api/v1/content", createSettingsRouter(ctx));
  app.use("/api/v1/files", createFilesRouter(ctx));
  app.use("/api/v1/cache", createCacheRouter(ctx));
  app.use("/api/v1/webhooks", createWebhooksRouter());

  // 404 handler
  app.use((_req, res) => {
    res.status(404).json({ error: "Not found" });
  });

  // Error handler
  app.use(
    (
      err: unknown,
      _req: express.Request,
      res: express.Response,
      _next: express.NextFunction,
    ) => {
      if (err instanceof SyntaxError && "body" in err) {
        logger.warn("Invalid JSON in request", { error: err.message });
        res.status(400).json({ error: "Invalid JSON in request body" });
        return;
      }

      // Express fails to decode a path parameter such as "%E0%A4%A"
      if (err instanceof URIError) {
        res.status(400).json({ error: "Invalid URL encoding" });
        return;
      }

      if (err instanceof multer.MulterError) {
        if (err.code === "LIMIT_FILE_SIZE") {
          res.status(413).json({ error: "File too large" });
          return;
        }
        res.status(400).json({ error: err.message });
        return;
      }

      logger.error("Unhandled error", { error: err });
      res.status(500).json({ error: "Internal server error" });
    },
  );

  return app;
}
