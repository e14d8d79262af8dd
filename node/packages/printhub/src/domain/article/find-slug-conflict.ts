import type { ArticleDbRow } from "../../lib/db/index.js";
import type { DataContext } from "../data-context.js";

export async function isArticleSlugTaken(
  ctx: DataContext,
  slug: string,
  excludeId?: string,
): Promise<boolean> {
  const query = ctx.db<ArticleDbRow>("article").where("slug", slug);
  if (excludeId) query.whereNot("id", excludeId);
  return (await query.first()) !== undefined;
}
