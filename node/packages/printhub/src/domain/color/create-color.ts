import { v4 as uuidv4 } from "uuid";
import { Result, success, failure, toError } from "../../lib/core/index.js";
import { createLogger } from "../../lib/logger/index.js";
import type { ColorDbRow } from "../../lib/db/index.js";
import type { DataContext } from "../data-context.js";
import type { Color, ColorInput } from "../../types.js";
import { mapColorFromDb } from "../../mappers.js";
import { resolveColorFields, validatePriceModifier } from "./color-fields.js";

const logger = createLogger("printhub:domain:color");

export type CreateColorInput = ColorInput & { name: string };

export async function createColor(
  ctx: DataContext,
  input: CreateColorInput,
): Promise<Result<Color, Error>> {
  try {
    const fields = resolveColorFields(input);
    if (!fields.success) {
      return fields;
    }
    const priceError = validatePriceModifier(input.priceModifier);
    if (priceError) {
      return failure(priceError);
    }

    const now = Date.now();
    const row: ColorDbRow = {
      id: uuidv4(),
      name: input.name,
      ...fields.data,
      is_active: input.isActive ?? true,
      is_new: input.isNew ?? false,
      sort_order: input.sortOrder ?? 0,
      price_modifier: input.priceModifier ?? 1,
      created_at: now,
      updated_at: now,
    };

    await ctx.db("color").insert(row);

    logger.info("Created color", { id: row.id, type: row.type });
    return success(mapColorFromDb(row));
  } catch (error) {
    logger.error("Failed to create color", { error });
    return failure(toError(error));
  }
}
