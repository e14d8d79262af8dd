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
import {
  countRows,
  toJson,
  type ContentBlockDbRow,
} from "../../lib/db/index.js";
import type { DataContext } from "../data-context.js";
import type {
  ContentBlock,
  CreateContentBlockInput,
  PaginatedResult,
  UpdateContentBlockInput,
} from "../../types.js";
import { mapContentBlockFromDb } from "../../mappers.js";

const logger = createLogger("printhub:domain:cms");

export const CMS_CACHE_PREFIX = "cms";

export type ListContentBlocksParams = {
  group?: string;
  limit?: number;
  offset?: number;
};

export async function listContentBlocks(
  ctx: DataContext,
  params: ListContentBlocksParams = {},
): Promise<Result<PaginatedResult<ContentBlock>, Error>> {
  try {
    const limit = params.limit ?? 100;
    const offset = params.offset ?? 0;

    const query = ctx.db<ContentBlockDbRow>("content_block");
    if (params.group) query.where("group_name", params.group);

    const total = await countRows(query);
    const rows: ContentBlockDbRow[] = await query
      .clone()
      .orderBy([
        { column: "group_name", order: "asc" },
        { column: "sort_order", order: "asc" },
        { column: "key", order: "asc" },
      ])
      .limit(limit)
      .offset(offset);

    return success({
      data: rows.map(mapContentBlockFromDb),
      pagination: { total, limit, offset },
    });
  } catch (error) {
    logger.error("Failed to list content blocks", { error });
    return failure(toError(error));
  }
}

/**
 * Distinct group names in use, sorted
 */
export async function listContentGroups(
  ctx: DataContext,
): Promise<Result<string[], Error>> {
  try {
    const rows = await ctx
      .db<ContentBlockDbRow>("content_block")
      .whereNotNull("group_name")
      .distinct("group_name")
      .orderBy("group_name", "asc");
    const groups: string[] = [];
    for (const row of rows) {
      if (row.group_name !== null) groups.push(row.group_name);
    }
    return success(groups);
  } catch (error) {
    logger.error("Failed to list content groups", { error });
    return failure(toError(error));
  }
}

async function isKeyTaken(
  ctx: DataContext,
  key: string,
  excludeId?: string,
): Promise<boolean> {
  const query = ctx.db<ContentBlockDbRow>("content_block").where("key", key);
  if (excludeId) query.whereNot("id", excludeId);
  return (await query.first()) !== undefined;
}

export async function createContentBlock(
  ctx: DataContext,
  input: CreateContentBlockInput,
): Promise<Result<ContentBlock, Error>> {
  try {
    if (await isKeyTaken(ctx, input.key)) {
      return failure(
        new ConflictError(`Content block with key "${input.key}" already exists`),
      );
    }

    const now = Date.now();
    const row: ContentBlockDbRow = {
      id: uuidv4(),
      key: input.key,
      content_type: input.contentType ?? "text",
      content: input.content ?? null,
      json_content: toJson(input.jsonContent),
      description: input.description ?? null,
      group_name: input.groupName ?? null,
      is_active: input.isActive ?? true,
      sort_order: input.sortOrder ?? 0,
      created_at: now,
      updated_at: now,
    };

    await ctx.db("content_block").insert(row);
    await ctx.cache.delPattern(`${CMS_CACHE_PREFIX}:*`);

    logger.info("Created content block", { id: row.id, key: row.key });
    return success(mapContentBlockFromDb(row));
  } catch (error) {
    logger.error("Failed to create content block", { error });
    return failure(toError(error));
  }
}

export async function updateContentBlock(
  ctx: DataContext,
  id: string,
  input: UpdateContentBlockInput,
): Promise<Result<ContentBlock, Error>> {
  try {
    const existing = await ctx
      .db<ContentBlockDbRow>("content_block")
      .where("id", id)
      .first();
    if (!existing) {
      return failure(new NotFoundError("Content block", id));
    }
    if (input.key !== undefined && (await isKeyTaken(ctx, input.key, id))) {
      return failure(
        new ConflictError(`Content block with key "${input.key}" already exists`),
      );
    }

    const changes: Partial<ContentBlockDbRow> = { updated_at: Date.now() };
    if (input.key !== undefined) changes.key = input.key;
    if (input.contentType !== undefined) changes.content_type = input.contentType;
    if (input.content !== undefined) changes.content = input.content;
    if (input.jsonContent !== undefined) {
      changes.json_content = toJson(input.jsonContent);
    }
    if (input.description !== undefined) changes.description = input.description;
    if (input.groupName !== undefined) changes.group_name = input.groupName;
    if (input.isActive !== undefined) changes.is_active = input.isActive;
    if (input.sortOrder !== undefined) changes.sort_order = input.sortOrder;

    await ctx.db("content_block").where("id", id).update(changes);
    await ctx.cache.delPattern(`${CMS_CACHE_PREFIX}:*`);

    logger.info("Updated content block", { id });
    return success(mapContentBlockFromDb({ ...existing, ...changes }));
  } catch (error) {
    logger.error("Failed to update content block", { error, id });
    return failure(toError(error));
  }
}

export async function deleteContentBlock(
  ctx: DataContext,
  id: string,
): Promise<Result<void, Error>> {
  try {
    const deleted = await ctx.db("content_block").where("id", id).delete();
    if (deleted === 0) {
      return failure(new NotFoundError("Content block", id));
    }
    await ctx.cache.delPattern(`${CMS_CACHE_PREFIX}:*`);
    logger.info("Deleted content block", { id });
    return success(undefined);
  } catch (error) {
    logger.error("Failed to delete content block", { error, id });
    return failure(toError(error));
  }
}
