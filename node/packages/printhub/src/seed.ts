/**
 * Seed reference data (categories, services, colors, site settings and
 * content blocks). Existing rows are left alone: categories are matched
 * by name or slug, services and colors by name, settings and content
 * blocks by key.
 */

import { readFile } from "fs/promises";
import { z } from "zod";
import {
  Result,
  success,
  failure,
  toError,
  ConflictError,
} from "./lib/core/index.js";
import { createLogger } from "./lib/logger/index.js";
import type { ColorDbRow, ServiceDbRow } from "./lib/db/index.js";
import type { DataContext } from "./domain/data-context.js";
import { createCategory } from "./domain/category/create-category.js";
import { createService } from "./domain/service/create-service.js";
import { createColor } from "./domain/color/create-color.js";
import { createSetting } from "./domain/settings/site-settings.js";
import { createContentBlock } from "./domain/cms/content-blocks.js";
import { createCategorySchema } from "./handlers/categories/create-category.js";
import { createServiceSchema } from "./handlers/services/create-service.js";
import { createColorSchema } from "./handlers/colors/write-color.js";
import { createSettingSchema } from "./handlers/settings/settings.js";
import { createContentBlockSchema } from "./handlers/cms/content.js";

const logger = createLogger("printhub:seed");

export const seedSchema = z.object({
  categories: z.array(createCategorySchema).default([]),
  services: z.array(createServiceSchema).default([]),
  colors: z.array(createColorSchema).default([]),
  settings: z.array(createSettingSchema).default([]),
  contentBlocks: z.array(createContentBlockSchema).default([]),
});

export type SeedData = z.infer<typeof seedSchema>;

export type SeedCount = { created: number; skipped: number };

export type SeedReport = Record<keyof SeedData, SeedCount>;

export async function loadSeedFile(path: string): Promise<SeedData> {
  const text = await readFile(path, "utf-8");
  return seedSchema.parse(JSON.parse(text));
}

async function seedEach<T>(
  items: T[],
  create: (item: T) => Promise<Result<unknown, Error> | "exists">,
): Promise<SeedCount> {
  const count: SeedCount = { created: 0, skipped: 0 };
  for (const item of items) {
    const result = await create(item);
    if (result === "exists") {
      count.skipped++;
    } else if (result.success) {
      count.created++;
    } else if (result.error instanceof ConflictError) {
      count.skipped++;
    } else {
      throw result.error;
    }
  }
  return count;
}

export async function seedDatabase(
  ctx: DataContext,
  data: SeedData,
): Promise<Result<SeedReport, Error>> {
  try {
    const report: SeedReport = {
      categories: await seedEach(data.categories, (input) =>
        createCategory(ctx, input),
      ),
      services: await seedEach(data.services, async (input) => {
        const existing = await ctx
          .db<ServiceDbRow>("service")
          .where("name", input.name)
          .first();
        return existing ? "exists" : createService(ctx, input);
      }),
      colors: await seedEach(data.colors, async (input) => {
        const existing = await ctx
          .db<ColorDbRow>("color")
          .where("name", input.name)
          .first();
        return existing ? "exists" : createColor(ctx, input);
      }),
      settings: await seedEach(data.settings, (input) =>
        createSetting(ctx, input),
      ),
      contentBlocks: await seedEach(data.contentBlocks, (input) =>
        createContentBlock(ctx, input),
      ),
    };

    logger.info("Seed complete", report);
    return success(report);
  } catch (error) {
    logger.error("Seed failed", { error });
    return failure(toError(error));
  }
}
