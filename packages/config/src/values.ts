/**
 * Configuration values.
 */

export type ConfigValue = string | number | boolean | null | readonly ConfigValue[] | ConfigObject;

export interface ConfigObject {
  readonly [key: string]: ConfigValue;
}

/** One `key = value` entry as written, duplicates included */
export interface Field {
  readonly key: string;
  /** `key` split at dots, unless it was quoted */
  readonly path: readonly string[];
  readonly value: ConfigValue;
  /** Source text of the value, trimmed */
  readonly source: string;
}

export function isConfigObject(value: ConfigValue | undefined): value is ConfigObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function isConfigArray(value: ConfigValue | undefined): value is readonly ConfigValue[] {
  return Array.isArray(value);
}

/**
 * Merge `overlay` over `base`. Nested objects merge key by key; any other
 * value replaces what was there.
 */
export function mergeObjects(base: ConfigObject, overlay: ConfigObject): ConfigObject {
  const result: Record<string, ConfigValue> = { ...base };
  for (const [key, value] of Object.entries(overlay)) {
    const existing = result[key];
    result[key] = isConfigObject(existing) && isConfigObject(value) ? mergeObjects(existing, value) : value;
  }
  return result;
}

/** Fields in order, later keys winning and nested objects merged. */
export function fieldsToObject(fields: readonly Field[]): ConfigObject {
  let result: ConfigObject = {};
  for (const field of fields) {
    result = mergeObjects(result, nest(field.path, field.value));
  }
  return result;
}

function nest(path: readonly string[], value: ConfigValue): ConfigObject {
  let result: ConfigValue = value;
  for (let i = path.length - 1; i >= 1; i--) {
    result = { [path[i]]: result };
  }
  return { [path[0]]: result };
}

/** Plain-text rendering used in messages and `${ref}` output. */
export function renderValue(value: ConfigValue): string {
  if (value === null) return "null";
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return JSON.stringify(value);
}
