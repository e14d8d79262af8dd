/**
 * zod building blocks for query strings
 */

import { z } from "zod";

export const queryBoolean = z
  .enum(["true", "false", "1", "0"])
  .transform((value) => value === "true" || value === "1");

export const paginationQuery = z.object({
  limit: z.coerce.number().int().min(1).max(1000).default(100),
  offset: z.coerce.number().int().min(0).default(0),
});

export const idParams = z.object({
  id: z.string().min(1),
});

/**
 * Comma separated list, e.g. `?keys=a,b,c`
 */
export const queryList = z
  .string()
  .transform((value) =>
    value
      .split(",")
      .map((item) => item.trim())
      .filter((item) => item.length > 0),
  );
