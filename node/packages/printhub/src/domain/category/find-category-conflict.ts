import type { CategoryDbRow } from "../../lib/db/index.js";
import type { DataContext } from "../data-context.js";

export async function findCategoryConflict(
  ctx: DataContext,
  name: string | undefined,
  slug: string | undefined,
  excludeId?: string,
): Promise<string | null> {
  if (name !== undefined) {
    const query = ctx.db<CategoryDbRow>("category").where("name", name);
    if (excludeId) query.whereNot("id", excludeId);
    if (await query.first()) {
      return `Category with name "${name}" already exists`;
    }
  }
  if (slug !== undefined) {
    const query = ctx.db<CategoryDbRow>("category").where("slug", slug);
    if (excludeId) query.whereNot("id", excludeId);
    if (await query.first()) {
      return `Category with slug "${slug}" already exists`;
    }
  }
  return null;
}
