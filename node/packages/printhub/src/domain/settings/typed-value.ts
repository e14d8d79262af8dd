import type { SiteSetting } from "../../types.js";

/**
 * Decode a stored setting by its value type. Unparseable JSON yields `{}`
 * and unparseable numbers `0`.
 */
export function typedSettingValue(setting: SiteSetting): unknown {
  const raw = setting.value ?? "";
  switch (setting.valueType) {
    case "json":
      try {
        return JSON.parse(raw);
      } catch {
        return {};
      }
    case "boolean":
      return ["true", "1", "yes"].includes(raw.trim().toLowerCase());
    case "number": {
      const parsed = Number(raw);
      return raw.trim() === "" || Number.isNaN(parsed) ? 0 : parsed;
    }
    case "text":
      return setting.value ?? null;
  }
}
