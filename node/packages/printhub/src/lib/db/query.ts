/**
 * Shared query helpers
 */

import type { Knex } from "knex";

export async function countRows(query: Knex.QueryBuilder): Promise<number> {
  const rows = await query
    .clone()
    .clearSelect()
    .clearOrder()
    .count({ count: "*" });
  const first = rows[0];
  return first ? Number(first.count) : 0;
}

/**
 * Escape LIKE wildcards so the term matches literally (escape char `\`)
 */
export function escapeLike(term: string): string {
  return term.replace(/[\\%_]/g, "\\$&");
}

/**
 * Case-insensitive substring match over several columns
 */
export function whereContains(
  query: Knex.QueryBuilder,
  columns: string[],
  term: string,
): Knex.QueryBuilder {
  const pattern = `%${escapeLike(term.toLowerCase())}%`;
  return query.where((builder) => {
    for (const column of columns) {
      builder.orWhereRaw("lower(??) like ? escape '\\'", [column, pattern]);
    }
  });
}

export function parseJson<T>(value: string | null, fallback: T): T {
  if (value === null || value === "") return fallback;
  try {
    return JSON.parse(value);
  } catch {
    return fallback;
  }
}

export function toJson(value: unknown): string | null {
  return value === undefined || value === null ? null : JSON.stringify(value);
}
