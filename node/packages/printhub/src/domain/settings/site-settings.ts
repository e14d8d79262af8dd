import { v4 as uuidv4 } from "uuid";
import {
  Result,
  success,
  failure,
  ConflictError,
  NotFoundError,
  toError,
} from "../../lib/core/index.js";
import { createLogger } from "../../lib/logger/index.js";
import { cached } from "../../lib/cache/index.js";
import type { SiteSettingDbRow } from "../../lib/db/index.js";
import type { DataContext } from "../data-context.js";
import type {
  CreateSiteSettingInput,
  SiteSetting,
  UpdateSiteSettingInput,
} from "../../types.js";
import { mapSiteSettingFromDb } from "../../mappers.js";
import { typedSettingValue } from "./typed-value.js";

const logger = createLogger("printhub:domain:settings");

const PUBLIC_SETTINGS_CACHE_KEY = "settings:public";

/**
 * Public settings as `{ key: typed value }`
 */
export function getPublicSettings(
  ctx: DataContext,
): Promise<Result<Record<string, unknown>, Error>> {
  return cached(
    ctx.cache,
    PUBLIC_SETTINGS_CACHE_KEY,
    ctx.config.cache.defaultTtlSeconds,
    async () => {
      try {
        const rows = await ctx
          .db<SiteSettingDbRow>("site_setting")
          .where("is_public", true)
          .orderBy("key", "asc");

        const settings: Record<string, unknown> = {};
        for (const row of rows) {
          settings[row.key] = typedSettingValue(mapSiteSettingFromDb(row));
        }
        return success(settings);
      } catch (error) {
        logger.error("Failed to load public settings", { error });
        return failure(toError(error));
      }
    },
  );
}

export async function listSettings(
  ctx: DataContext,
  category?: string,
): Promise<Result<SiteSetting[], Error>> {
  try {
    const query = ctx.db<SiteSettingDbRow>("site_setting");
    if (category) query.where("category", category);
    const rows: SiteSettingDbRow[] = await query.orderBy([
      { column: "category", order: "asc" },
      { column: "key", order: "asc" },
    ]);
    return success(rows.map(mapSiteSettingFromDb));
  } catch (error) {
    logger.error("Failed to list settings", { error });
    return failure(toError(error));
  }
}

export async function createSetting(
  ctx: DataContext,
  input: CreateSiteSettingInput,
): Promise<Result<SiteSetting, Error>> {
  try {
    const existing = await ctx
      .db<SiteSettingDbRow>("site_setting")
      .where("key", input.key)
      .first();
    if (existing) {
      return failure(
        new ConflictError(`Setting with key "${input.key}" already exists`),
      );
    }

    const now = Date.now();
    const row: SiteSettingDbRow = {
      id: uuidv4(),
      key: input.key,
      value: input.value ?? null,
      value_type: input.valueType ?? "text",
      description: input.description ?? null,
      category: input.category ?? "general",
      is_public: input.isPublic ?? true,
      created_at: now,
      updated_at: now,
    };

    await ctx.db("site_setting").insert(row);
    await ctx.cache.del(PUBLIC_SETTINGS_CACHE_KEY);

    logger.info("Created setting", { key: row.key });
    return success(mapSiteSettingFromDb(row));
  } catch (error) {
    logger.error("Failed to create setting", { error });
    return failure(toError(error));
  }
}

export async function updateSetting(
  ctx: DataContext,
  key: string,
  input: UpdateSiteSettingInput,
): Promise<Result<SiteSetting, Error>> {
  try {
    const existing = await ctx
      .db<SiteSettingDbRow>("site_setting")
      .where("key", key)
      .first();
    if (!existing) {
      return failure(new NotFoundError("Setting", key));
    }

    const changes: Partial<SiteSettingDbRow> = { updated_at: Date.now() };
    if (input.value !== undefined) changes.value = input.value;
    if (input.valueType !== undefined) changes.value_type = input.valueType;
    if (input.description !== undefined) changes.description = input.description;
    if (input.category !== undefined) changes.category = input.category;
    if (input.isPublic !== undefined) changes.is_public = input.isPublic;

    await ctx.db("site_setting").where("key", key).update(changes);
    await ctx.cache.del(PUBLIC_SETTINGS_CACHE_KEY);

    logger.info("Updated setting", { key });
    return success(mapSiteSettingFromDb({ ...existing, ...changes }));
  } catch (error) {
    logger.error("Failed to update setting", { error, key });
    return failure(toError(error));
  }
}

export async function deleteSetting(
  ctx: DataContext,
  key: string,
): Promise<Result<void, Error>> {
  try {
    const deleted = await ctx.db("site_setting").where("key", key).delete();
    if (deleted === 0) {
      return failure(new NotFoundError("Setting", key));
    }
    await ctx.cache.del(PUBLIC_SETTINGS_CACHE_KEY);
    logger.info("Deleted setting", { key });
    return success(undefined);
  } catch (error) {
    logger.error("Failed to delete setting", { error, key });
    return failure(toError(error));
  }
}
