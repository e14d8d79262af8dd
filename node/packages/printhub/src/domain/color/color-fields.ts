import {
  Result,
  success,
  failure,
  ValidationError,
} from "../../lib/core/index.js";
import { parseJson, toJson, type ColorDbRow } from "../../lib/db/index.js";
import type { ColorInput, ColorType, GradientStop } from "../../types.js";

export const HEX_COLOR_REGEX = /^#[0-9A-Fa-f]{6}$/;

export const COLOR_TYPES: { value: ColorType; label: string }[] = [
  { value: "solid", label: "Solid" },
  { value: "gradient", label: "Gradient" },
  { value: "metallic", label: "Metallic" },
];

type TypeFields = Pick<
  ColorDbRow,
  | "type"
  | "hex_code"
  | "gradient_colors"
  | "gradient_direction"
  | "metallic_base"
  | "metallic_intensity"
>;

/**
 * Current type-specific values of a stored color, as input
 */
export function colorInputFromRow(row: ColorDbRow): ColorInput {
  return {
    type: row.type,
    hexCode: row.hex_code,
    gradientColors: parseJson<GradientStop[] | null>(row.gradient_colors, null),
    gradientDirection:
      row.gradient_direction === "radial" || row.gradient_direction === "linear"
        ? row.gradient_direction
        : null,
    metallicBase: row.metallic_base,
    metallicIntensity: row.metallic_intensity,
  };
}

/**
 * Check the type-specific fields and return the columns to store. Fields
 * of other types are cleared.
 */
export function resolveColorFields(
  input: ColorInput,
): Result<TypeFields, ValidationError> {
  const type = input.type ?? "solid";
  const cleared: TypeFields = {
    type,
    hex_code: null,
    gradient_colors: null,
    gradient_direction: null,
    metallic_base: null,
    metallic_intensity: null,
  };

  switch (type) {
    case "solid": {
      if (!input.hexCode) {
        return failure(new ValidationError("hexCode is required for solid colors"));
      }
      if (!HEX_COLOR_REGEX.test(input.hexCode)) {
        return failure(new ValidationError("hexCode must be in #RRGGBB format"));
      }
      return success({ ...cleared, hex_code: input.hexCode });
    }

    case "gradient": {
      const stops = input.gradientColors ?? [];
      if (stops.length < 2) {
        return failure(
          new ValidationError("Gradient colors need at least 2 color stops"),
        );
      }
      for (const stop of stops) {
        if (!HEX_COLOR_REGEX.test(stop.color)) {
          return failure(
            new ValidationError("Gradient stop colors must be in #RRGGBB format"),
          );
        }
        if (stop.position < 0 || stop.position > 100) {
          return failure(
            new ValidationError("Gradient stop positions must be between 0 and 100"),
          );
        }
      }
      return success({
        ...cleared,
        gradient_colors: toJson(stops),
        gradient_direction: input.gradientDirection ?? "linear",
      });
    }

    case "metallic": {
      if (!input.metallicBase) {
        return failure(
          new ValidationError("metallicBase is required for metallic colors"),
        );
      }
      if (!HEX_COLOR_REGEX.test(input.metallicBase)) {
        return failure(
          new ValidationError("metallicBase must be in #RRGGBB format"),
        );
      }
      const intensity = input.metallicIntensity ?? 0.5;
      if (intensity < 0 || intensity > 1) {
        return failure(
          new ValidationError("metallicIntensity must be between 0 and 1"),
        );
      }
      return success({
        ...cleared,
        metallic_base: input.metallicBase,
        metallic_intensity: intensity,
      });
    }
  }
}

export function validatePriceModifier(
  value: number | undefined,
): ValidationError | null {
  if (value !== undefined && !(value > 0)) {
    return new ValidationError("priceModifier must be greater than 0");
  }
  return null;
}
