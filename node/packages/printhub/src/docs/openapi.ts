import { zodToJsonSchema } from "zod-to-json-schema";
import { routeRegistry, type RouteDoc } from "./registry.js";

type JsonObject = Record<string, unknown>;

export type OpenApiDocument = {
  openapi: "3.0.3";
  info: { title: string; version: string; description: string };
  tags: Array<{ name: string }>;
  paths: Record<string, Record<string, JsonObject>>;
  components: JsonObject;
};

/**
 * `/projects/:id/stl` -> `/projects/{id}/stl`
 */
export function toOpenApiPath(path: string): {
  path: string;
  params: string[];
} {
  const params: string[] = [];
  const converted = path.replace(/:([A-Za-z_][A-Za-z0-9_]*)/g, (_m, name: string) => {
    params.push(name);
    return `{${name}}`;
  });
  return { path: converted, params };
}

function requestBody(route: RouteDoc): JsonObject | undefined {
  if (route.multipart) {
    return {
      required: true,
      content: {
        "multipart/form-data": {
          schema: { type: "object", additionalProperties: true },
        },
      },
    };
  }
  if (!route.body) return undefined;

  const schema = zodToJsonSchema(route.body, {
    target: "openApi3",
    $refStrategy: "none",
  });
  return {
    required: true,
    content: { "application/json": { schema } },
  };
}

function operation(route: RouteDoc, params: string[]): JsonObject {
  const responses: JsonObject = {
    "200": { description: "Success" },
    "400": { description: "Invalid request" },
  };
  if (route.access !== "public") {
    responses["401"] = { description: "Not authenticated" };
  }
  if (route.access === "admin") {
    responses["403"] = { description: "Admin role required" };
  }

  const op: JsonObject = {
    summary: route.summary,
    tags: [route.tag],
    parameters: params.map((name) => ({
      name,
      in: "path",
      required: true,
      schema: { type: "string" },
    })),
    responses,
  };

  const body = requestBody(route);
  if (body) op.requestBody = body;
  if (route.access !== "public") op.security = [{ bearerAuth: [] }];
  return op;
}

export function buildOpenApiDocument(
  version: string,
  routes: RouteDoc[] = routeRegistry,
): OpenApiDocument {
  const paths: OpenApiDocument["paths"] = {};
  const tags: string[] = [];

  for (const route of routes) {
    const { path, params } = toOpenApiPath(route.path);
    const item = paths[path] ?? {};
    item[route.method] = operation(route, params);
    paths[path] = item;
    if (!tags.includes(route.tag)) tags.push(route.tag);
  }

  return {
    openapi: "3.0.3",
    info: {
      title: "PrintHub API",
      version,
      description: "Backend API for a 3D printing service platform",
    },
    tags: tags.map((name) => ({ name })),
    paths,
    components: {
      securitySchemes: {
        bearerAuth: { type: "http", scheme: "bearer", bearerFormat: "JWT" },
      },
    },
  };
}
