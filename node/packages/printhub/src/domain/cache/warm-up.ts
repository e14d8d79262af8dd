import { Result, success } from "../../lib/core/index.js";
import { createLogger } from "../../lib/logger/index.js";
import type { DataContext } from "../data-context.js";
import { listServices } from "../service/list-services.js";
import {
  listFeaturedProjects,
  listProjectCategories,
  listProjects,
} from "../project/list-projects.js";
import { getPublicSettings } from "../settings/site-settings.js";

const logger = createLogger("printhub:domain:cache");

export type WarmUpResult = {
  warmed: string[];
  failed: string[];
};

/**
 * Load the public pages' first requests into the cache. Parameters match
 * the handlers' defaults so the keys are the ones visitors hit.
 */
const WARM_UP_LOADERS: [string, (ctx: DataContext) => Promise<Result<unknown, Error>>][] = [
  ["services", (ctx) => listServices(ctx, { activeOnly: true, limit: 100, offset: 0 })],
  ["projects", (ctx) => listProjects(ctx, { page: 1, perPage: 12 })],
  ["featuredProjects", (ctx) => listFeaturedProjects(ctx, 10)],
  ["projectCategories", (ctx) => listProjectCategories(ctx)],
  ["publicSettings", (ctx) => getPublicSettings(ctx)],
];

export async function warmUpCache(
  ctx: DataContext,
): Promise<Result<WarmUpResult, Error>> {
  const warmed: string[] = [];
  const failed: string[] = [];

  for (const [name, load] of WARM_UP_LOADERS) {
    const result = await load(ctx);
    if (result.success) {
      warmed.push(name);
    } else {
      logger.warn("Cache warm-up step failed", { name, error: result.error });
      failed.push(name);
    }
  }

  logger.info("Cache warmed up", { warmed: warmed.length, failed: failed.length });
  return success({ warmed, failed });
}
