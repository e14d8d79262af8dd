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
import { toJson, type PageDbRow } from "../../lib/db/index.js";
import type { DataContext } from "../data-context.js";
import type { CreatePageInput, Page, UpdatePageInput } from "../../types.js";
import { mapPageFromDb } from "../../mappers.js";

const logger = createLogger("printhub:domain:cms");

export async function listPages(ctx: DataContext): Promise<Result<Page[], Error>> {
  try {
    const rows = await ctx.db<PageDbRow>("page").orderBy("slug", "asc");
    return success(rows.map(mapPageFromDb));
  } catch (error) {
    logger.error("Failed to list pages", { error });
    return failure(toError(error));
  }
}

export async function getPageBySlug(
  ctx: DataContext,
  slug: string,
  activeOnly: boolean,
): Promise<Result<Page | null, Error>> {
  try {
    const query = ctx.db<PageDbRow>("page").where("slug", slug);
    if (activeOnly) query.where("is_active", true);
    const row = await query.first();
    return success(row ? mapPageFromDb(row) : null);
  } catch (error) {
    logger.error("Failed to get page", { error, slug });
    return failure(toError(error));
  }
}

async function isSlugTaken(
  ctx: DataContext,
  slug: string,
  excludeId?: string,
): Promise<boolean> {
  const query = ctx.db<PageDbRow>("page").where("slug", slug);
  if (excludeId) query.whereNot("id", excludeId);
  return (await query.first()) !== undefined;
}

export async function createPage(
  ctx: DataContext,
  input: CreatePageInput,
): Promise<Result<Page, Error>> {
  try {
    if (await isSlugTaken(ctx, input.slug)) {
      return failure(
        new ConflictError(`Page with slug "${input.slug}" already exists`),
      );
    }

    const now = Date.now();
    const row: PageDbRow = {
      id: uuidv4(),
      slug: input.slug,
      title: input.title,
      meta_title: input.metaTitle ?? null,
      meta_description: input.metaDescription ?? null,
      content: toJson(input.content),
      page_type: input.pageType ?? "custom",
      is_active: input.isActive ?? true,
      created_at: now,
      updated_at: now,
    };

    await ctx.db("page").insert(row);

    logger.info("Created page", { id: row.id, slug: row.slug });
    return success(mapPageFromDb(row));
  } catch (error) {
    logger.error("Failed to create page", { error });
    return failure(toError(error));
  }
}

export async function updatePage(
  ctx: DataContext,
  id: string,
  input: UpdatePageInput,
): Promise<Result<Page, Error>> {
  try {
    const existing = await ctx.db<PageDbRow>("page").where("id", id).first();
    if (!existing) {
      return failure(new NotFoundError("Page", id));
    }
    if (input.slug !== undefined && (await isSlugTaken(ctx, input.slug, id))) {
      return failure(
        new ConflictError(`Page with slug "${input.slug}" already exists`),
      );
    }

    const changes: Partial<PageDbRow> = { updated_at: Date.now() };
    if (input.slug !== undefined) changes.slug = input.slug;
    if (input.title !== undefined) changes.title = input.title;
    if (input.metaTitle !== undefined) changes.meta_title = input.metaTitle;
    if (input.metaDescription !== undefined) {
      changes.meta_description = input.metaDescription;
    }
    if (input.content !== undefined) changes.content = toJson(input.content);
    if (input.pageType !== undefined) changes.page_type = input.pageType;
    if (input.isActive !== undefined) changes.is_active = input.isActive;

    await ctx.db("page").where("id", id).update(changes);

    logger.info("Updated page", { id });
    return success(mapPageFromDb({ ...existing, ...changes }));
  } catch (error) {
    logger.error("Failed to update page", { error, id });
    return failure(toError(error));
  }
}

export async function deletePage(
  ctx: DataContext,
  id: string,
): Promise<Result<void, Error>> {
  try {
    const deleted = await ctx.db("page").where("id", id).delete();
    if (deleted === 0) {
      return failure(new NotFoundError("Page", id));
    }
    logger.info("Deleted page", { id });
    return success(undefined);
  } catch (error) {
    logger.error("Failed to delete page", { error, id });
    return failure(toError(error));
  }
}
