import { Router } from "express";
import swaggerUi from "swagger-ui-express";
import type { DataContext } from "../domain/data-context.js";
import { buildOpenApiDocument } from "../docs/openapi.js";

export const API_VERSION = "1.0.0";

const REDOC_HTML = `<!DOCTYPE html>
<html>
  <head>
    <title>PrintHub API - ReDoc</title>
    <meta charset="utf-8"/>
    <meta name="viewport" content="width=device-width, initial-scale=1">
  </head>
  <body>
    <redoc spec-url="/openapi.json"></redoc>
    <script src="https://cdn.redoc.ly/redoc/latest/bundles/redoc.standalone.js"></script>
  </body>
</html>`;

/**
 * /openapi.json always; /docs and /redoc only outside production
 */
export function createDocsRouter(ctx: DataContext): Router {
  const router = Router();
  const document = buildOpenApiDocument(API_VERSION);

  router.get("/openapi.json", (_req, res) => {
    res.json(document);
  });

  if (ctx.config.docs.enabled) {
    router.use("/docs", swaggerUi.serve, swaggerUi.setup(document));
    router.get("/redoc", (_req, res) => {
      res.type("html").send(REDOC_HTML);
    });
  }

  return router;
}
