import {
  Result,
  success,
  failure,
  NotFoundError,
  toError,
} from "../../lib/core/index.js";
import { createLogger } from "../../lib/logger/index.js";
import type { ColorDbRow } from "../../lib/db/index.js";
import type { DataContext } from "../data-context.js";
import type { Color, ColorInput } from "../../types.js";
import { mapColorFromDb } from "../../mappers.js";
import {
  colorInputFromRow,
  resolveColorFields,
  validatePriceModifier,
} from "./color-fields.js";

const logger = createLogger("printhub:domain:color");

function keep<T>(next: T | undefined, current: T): T {
  return next === undefined ? current : next;
}

function mergeTypeFields(current: ColorInput, input: ColorInput): ColorInput {
  return {
    type: keep(input.type, current.type),
    hexCode: keep(input.hexCode, current.hexCode),
    gradientColors: keep(input.gradientColors, current.gradientColors),
    gradientDirection: keep(input.gradientDirection, current.gradientDirection),
    metallicBase: keep(input.metallicBase, current.metallicBase),
    metallicIntensity: keep(input.metallicIntensity, current.metallicIntensity),
  };
}

/**
 * Apply a partial update; the type rules are checked on the merged color
 */
export async function updateColor(
  ctx: DataContext,
  id: string,
  input: ColorInput,
): Promise<Result<Color, Error>> {
  try {
    const existing = await ctx.db<ColorDbRow>("color").where("id", id).first();
    if (!existing) {
      return failure(new NotFoundError("Color", id));
    }

    const fields = resolveColorFields(
      mergeTypeFields(colorInputFromRow(existing), input),
    );
    if (!fields.success) {
      return fields;
    }
    const priceError = validatePriceModifier(input.priceModifier);
    if (priceError) {
      return failure(priceError);
    }

    const changes: Partial<ColorDbRow> = {
      ...fields.data,
      updated_at: Date.now(),
    };
    if (input.name !== undefined) changes.name = input.name;
    if (input.isActive !== undefined) changes.is_active = input.isActive;
    if (input.isNew !== undefined) changes.is_new = input.isNew;
    if (input.sortOrder !== undefined) changes.sort_order = input.sortOrder;
    if (input.priceModifier !== undefined) {
      changes.price_modifier = input.priceModifier;
    }

    await ctx.db("color").where("id", id).update(changes);

    logger.info("Updated color", { id });
    return success(mapColorFromDb({ ...existing, ...changes }));
  } catch (error) {
    logger.error("Failed to update color", { error, id });
    return failure(toError(error));
  }
}

export type ColorFlag = "isActive" | "isNew";

export async function toggleColorFlag(
  ctx: DataContext,
  id: string,
  flag: ColorFlag,
): Promise<Result<Color, Error>> {
  try {
    const existing = await ctx.db<ColorDbRow>("color").where("id", id).first();
    if (!existing) {
      return failure(new NotFoundError("Color", id));
    }

    const changes: Partial<ColorDbRow> = { updated_at: Date.now() };
    if (flag === "isActive") {
      changes.is_active = !existing.is_active;
    } else {
      changes.is_new = !existing.is_new;
    }

    await ctx.db("color").where("id", id).update(changes);

    logger.info("Toggled color flag", { id, flag });
    return success(mapColorFromDb({ ...existing, ...changes }));
  } catch (error) {
    logger.error("Failed to toggle color flag", { error, id, flag });
    return failure(toError(error));
  }
}
