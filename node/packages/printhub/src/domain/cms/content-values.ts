import { Result, success, failure, toError } from "../../lib/core/index.js";
import { createLogger } from "../../lib/logger/index.js";
import { cached, cacheKey } from "../../lib/cache/index.js";
import type { ContentBlockDbRow } from "../../lib/db/index.js";
import type { DataContext } from "../data-context.js";
import type { ContentBlock } from "../../types.js";
import { mapContentBlockFromDb } from "../../mappers.js";
import { CMS_CACHE_PREFIX } from "./content-blocks.js";

const logger = createLogger("printhub:domain:cms");

export type ContentSelector = { keys: string[] } | { group: string };

/**
 * The value a site page renders: parsed JSON for json blocks, the text
 * otherwise
 */
export function contentValue(block: ContentBlock): unknown {
  return block.contentType === "json"
    ? (block.jsonContent ?? null)
    : (block.content ?? null);
}

/**
 * Active blocks as a `{ key: value }` map
 */
export function getContentValues(
  ctx: DataContext,
  selector: ContentSelector,
): Promise<Result<Record<string, unknown>, Error>> {
  const key = cacheKey(`${CMS_CACHE_PREFIX}:values`, selector);
  return cached(ctx.cache, key, ctx.config.cache.defaultTtlSeconds, async () => {
    try {
      const query = ctx
        .db<ContentBlockDbRow>("content_block")
        .where("is_active", true);
      if ("keys" in selector) {
        if (selector.keys.length === 0) return success({});
        query.whereIn("key", selector.keys);
      } else {
        query.where("group_name", selector.group);
      }

      const rows: ContentBlockDbRow[] = await query.orderBy([
        { column: "sort_order", order: "asc" },
        { column: "key", order: "asc" },
      ]);

      const values: Record<string, unknown> = {};
      for (const row of rows) {
        const block = mapContentBlockFromDb(row);
        values[block.key] = contentValue(block);
      }
      return success(values);
    } catch (error) {
      logger.error("Failed to load content values", { error, selector });
      return failure(toError(error));
    }
  });
}
