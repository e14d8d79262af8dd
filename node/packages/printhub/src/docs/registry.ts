/**
 * Route registry used to build the OpenAPI document.
 * Paths use express syntax; request bodies are the handlers' zod schemas.
 */

import type { ZodTypeAny } from "zod";
import { loginSchema } from "../handlers/auth/login.js";
import { changePasswordSchema } from "../handlers/auth/change-password.js";
import { createUserSchema } from "../handlers/users/create-user.js";
import { updateUserSchema } from "../handlers/users/update-user.js";
import { createServiceSchema } from "../handlers/services/create-service.js";
import { updateServiceSchema } from "../handlers/services/update-service.js";
import { createCategorySchema } from "../handlers/categories/create-category.js";
import { updateCategorySchema } from "../handlers/categories/update-category.js";
import { createProjectSchema } from "../handlers/projects/create-project.js";
import { updateProjectSchema } from "../handlers/projects/update-project.js";
import { createOrderSchema } from "../handlers/orders/create-order.js";
import {
  statusChangeSchema,
  updateOrderSchema,
} from "../handlers/orders/update-order.js";
import { createArticleSchema } from "../handlers/articles/create-article.js";
import { updateArticleSchema } from "../handlers/articles/update-article.js";
import {
  createColorSchema,
  updateColorSchema,
} from "../handlers/colors/write-color.js";
import {
  featureReviewSchema,
  moderateReviewSchema,
  updateReviewSchema,
} from "../handlers/reviews/moderate-review.js";
import { createContactRequestSchema } from "../handlers/contact/create-contact-request.js";
import {
  contactNotesBodySchema,
  contactStatusBodySchema,
  updateContactRequestSchema,
} from "../handlers/contact/update-contact-request.js";
import {
  createContentBlockSchema,
  updateContentBlockSchema,
} from "../handlers/cms/content.js";
import { createPageSchema, updatePageSchema } from "../handlers/cms/pages.js";
import { telegramNotificationSchema } from "../handlers/webhooks/telegram.js";
import {
  createSettingSchema,
  updateSettingSchema,
} from "../handlers/settings/settings.js";

export type HttpMethod = "get" | "post" | "put" | "patch" | "delete";

export type Access = "public" | "user" | "admin";

export type RouteDoc = {
  method: HttpMethod;
  path: string;
  summary: string;
  tag: string;
  access: Access;
  body?: ZodTypeAny;
  multipart?: boolean;
};

function group(
  tag: string,
  prefix: string,
  entries: Array<
    [HttpMethod, string, string, Access, (ZodTypeAny | "multipart")?]
  >,
): RouteDoc[] {
  return entries.map(([method, path, summary, access, body]) => ({
    method,
    path: `${prefix}${path}`,
    summary,
    tag,
    access,
    body: body === "multipart" ? undefined : body,
    multipart: body === "multipart",
  }));
}

const API = "/api/v1";

export const routeRegistry: RouteDoc[] = [
  ...group("health", "", [
    ["get", "/health", "Service health", "public"],
    ["get", "/health/live", "Liveness probe", "public"],
    ["get", "/health/ready", "Readiness probe", "public"],
  ]),
  ...group("auth", `${API}/auth`, [
    ["post", "/login", "Log in with username or email", "public", loginSchema],
    ["post", "/login/token", "Log in (token form)", "public", loginSchema],
    ["get", "/me", "Current user", "user"],
    ["post", "/change-password", "Change own password", "user", changePasswordSchema],
  ]),
  ...group("users", `${API}/users`, [
    ["get", "", "List users", "admin"],
    ["post", "", "Create user", "admin", createUserSchema],
    ["get", "/:id", "Get user", "admin"],
    ["put", "/:id", "Update user", "admin", updateUserSchema],
    ["delete", "/:id", "Delete user", "admin"],
  ]),
  ...group("services", `${API}/services`, [
    ["get", "", "List services", "public"],
    ["get", "/search", "Search services", "public"],
    ["get", "/:id", "Get service", "public"],
    ["post", "", "Create service", "admin", createServiceSchema],
    ["put", "/:id", "Update service", "admin", updateServiceSchema],
    ["delete", "/:id", "Delete service", "admin"],
    ["post", "/:id/activate", "Activate service", "admin"],
    ["put", "/:id/deactivate", "Deactivate service", "admin"],
  ]),
  ...group("categories", `${API}/categories`, [
    ["get", "", "List categories", "public"],
    ["get", "/search", "Search categories", "public"],
    ["get", "/slug/:slug", "Get category by slug", "public"],
    ["get", "/:id", "Get category", "public"],
    ["post", "", "Create category", "admin", createCategorySchema],
    ["put", "/:id", "Update category", "admin", updateCategorySchema],
    ["delete", "/:id", "Deactivate category", "admin"],
    ["post", "/:id/activate", "Activate category", "admin"],
  ]),
  ...group("projects", `${API}/projects`, [
    ["get", "", "List projects (paged)", "public"],
    ["get", "/featured", "Featured projects", "public"],
    ["get", "/categories", "Project categories in use", "public"],
    ["get", "/complexity-levels", "Complexity levels", "public"],
    ["get", "/:id", "Get project", "public"],
    ["get", "/:id/stl", "Download the project STL", "public"],
    ["post", "", "Create project", "admin", createProjectSchema],
    ["put", "/:id", "Update project", "admin", updateProjectSchema],
    ["delete", "/:id", "Delete project", "admin"],
    ["post", "/:id/stl", "Upload STL (field `file`)", "admin", "multipart"],
    ["post", "/:id/images", "Upload images (field `files`)", "admin", "multipart"],
  ]),
  ...group("orders", `${API}/orders`, [
    ["post", "", "Place an order", "public", createOrderSchema],
    ["get", "/search", "Find orders by email", "public"],
    ["post", "/:id/files", "Attach files (field `files`)", "public", "multipart"],
    ["get", "", "List orders", "admin"],
    ["get", "/:id", "Get order with files", "admin"],
    ["put", "/:id", "Update order", "admin", updateOrderSchema],
    ["delete", "/:id", "Delete order", "admin"],
    ["post", "/webhook/status-change", "Announce a status change to the bot", "admin", statusChangeSchema],
  ]),
  ...group("articles", `${API}/articles`, [
    ["get", "", "List articles", "public"],
    ["get", "/slug/:slug", "Get article by slug", "public"],
    ["get", "/:id", "Get article", "public"],
    ["post", "", "Create article", "admin", createArticleSchema],
    ["put", "/:id", "Update article", "admin", updateArticleSchema],
    ["delete", "/:id", "Delete article", "admin"],
  ]),
  ...group("colors", `${API}/colors`, [
    ["get", "/types", "Color types", "public"],
    ["get", "", "List colors", "public"],
    ["get", "/by-type/:type", "Active colors of a type", "public"],
    ["get", "/:id", "Get color", "public"],
    ["post", "", "Create color", "admin", createColorSchema],
    ["put", "/:id", "Update color", "admin", updateColorSchema],
    ["delete", "/:id", "Delete color", "admin"],
    ["patch", "/:id/toggle-active", "Toggle active flag", "admin"],
    ["patch", "/:id/toggle-new", "Toggle new flag", "admin"],
  ]),
  ...group("reviews", `${API}/reviews`, [
    ["post", "", "Submit a review (field `images`)", "public", "multipart"],
    ["get", "", "Approved reviews", "public"],
    ["get", "/stats", "Rating statistics", "public"],
    ["get", "/featured", "Featured reviews", "public"],
    ["get", "/:id", "Get approved review", "public"],
    ["get", "/admin/all", "All reviews", "admin"],
    ["get", "/admin/pending", "Reviews awaiting moderation", "admin"],
    ["get", "/admin/search", "Search reviews", "admin"],
    ["get", "/admin/:id", "Get any review", "admin"],
    ["put", "/admin/:id", "Update review", "admin", updateReviewSchema],
    ["put", "/admin/:id/moderate", "Moderate review", "admin", moderateReviewSchema],
    ["put", "/admin/:id/approve", "Approve review", "admin"],
    ["put", "/admin/:id/reject", "Reject review", "admin"],
    ["put", "/admin/:id/feature", "Feature review", "admin", featureReviewSchema],
    ["delete", "/admin/:id", "Delete review", "admin"],
  ]),
  ...group("contact", `${API}/contact`, [
    ["post", "", "Submit a contact request", "public", createContactRequestSchema],
    ["get", "/admin", "List contact requests", "admin"],
    ["get", "/admin/stats", "Contact statistics", "admin"],
    ["get", "/admin/search", "Search contact requests", "admin"],
    ["get", "/admin/new", "New contact requests", "admin"],
    ["get", "/admin/in-progress", "Contact requests in progress", "admin"],
    ["get", "/admin/recent", "Contact requests of the last `days`", "admin"],
    ["get", "/admin/by-email/:email", "Contact requests by email", "admin"],
    ["get", "/admin/:id", "Get contact request", "admin"],
    ["put", "/admin/:id", "Update contact request", "admin", updateContactRequestSchema],
    ["put", "/admin/:id/status", "Set status", "admin", contactStatusBodySchema],
    ["put", "/admin/:id/notes", "Set admin notes", "admin", contactNotesBodySchema],
    ["delete", "/admin/:id", "Delete contact request", "admin"],
  ]),
  ...group("cms", `${API}/cms`, [
    ["get", "/content/by-keys", "Content values by keys", "public"],
    ["get", "/content/by-group/:group", "Content values by group", "public"],
    ["get", "/pages/:slug", "Get active page", "public"],
    ["get", "/admin/content", "List content blocks", "admin"],
    ["get", "/admin/content/groups", "Content groups", "admin"],
    ["post", "/admin/content", "Create content block", "admin", createContentBlockSchema],
    ["put", "/admin/content/:id", "Update content block", "admin", updateContentBlockSchema],
    ["delete", "/admin/content/:id", "Delete content block", "admin"],
    ["get", "/admin/pages", "List pages", "admin"],
    ["post", "/admin/pages", "Create page", "admin", createPageSchema],
    ["put", "/admin/pages/:id", "Update page", "admin", updatePageSchema],
    ["delete", "/admin/pages/:id", "Delete page", "admin"],
  ]),
  ...group("settings", `${API}/content`, [
    ["get", "/settings/public", "Public settings as typed values", "public"],
    ["get", "/admin/settings", "List settings", "admin"],
    ["post", "/admin/settings", "Create setting", "admin", createSettingSchema],
    ["put", "/admin/settings/:key", "Update setting", "admin", updateSettingSchema],
    ["delete", "/admin/settings/:key", "Delete setting", "admin"],
  ]),
  ...group("files", `${API}/files`, [
    ["get", "/raw/:key", "Serve a stored file", "public"],
    ["post", "/upload", "Upload a file (field `file`)", "admin", "multipart"],
    ["delete", "", "Delete a file by key", "admin"],
    ["get", "/list", "List files under a prefix", "admin"],
    ["get", "/info", "File metadata", "admin"],
    ["get", "/presigned-url", "Presigned download URL (S3)", "admin"],
    ["get", "/validate", "Check a file name and size against the upload rules", "public"],
    ["get", "/stats", "Storage usage by category and folder", "admin"],
    ["post", "/cleanup", "Delete old files under temp/", "admin"],
    ["post", "/cleanup/orphaned", "Delete files no record references", "admin"],
    ["post", "/cleanup/full", "Orphaned and temp cleanup", "admin"],
  ]),
  ...group("cache", `${API}/cache`, [
    ["get", "/stats", "Cache statistics", "admin"],
    ["delete", "/clear", "Clear cache entries", "admin"],
    ["get", "/keys", "List cache keys", "admin"],
    ["get", "/key/:key", "Read a cache key", "admin"],
    ["delete", "/key/:key", "Delete a cache key", "admin"],
    ["post", "/warm-up", "Warm up the cache", "admin"],
  ]),
  ...group("webhooks", `${API}/webhooks`, [
    ["post", "/telegram/notifications", "Receive a bot notification", "public", telegramNotificationSchema],
    ["get", "/telegram/health", "Telegram webhook health", "public"],
  ]),
];
