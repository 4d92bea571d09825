export type TomlScalar = string | number | boolean;

export type TomlValue = TomlScalar | TomlValue[] | TomlTable;

export interface TomlTable {
  [key: string]: TomlValue;
}

/** A table under construction: leaves may still be null or absent. */
export interface TomlDraft {
  [key: string]: TomlValue | TomlDraft | null | undefined;
}

export function isTable(value: unknown): value is TomlTable {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isDraft(value: unknown): value is TomlDraft {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Drop null and undefined entries, recursing into nested tables. A nested
 * table left empty by pruning is dropped too; one that was empty to begin
 * with is kept.
 */
export function compact(draft: TomlDraft): TomlTable {
  const table: TomlTable = {};
  for (const [key, value] of Object.entries(draft)) {
    if (value === null || value === undefined) continue;
    if (isDraft(value)) {
      const nested = compact(value);
      if (Object.keys(nested).length === 0 && Object.keys(value).length > 0) continue;
      table[key] = nested;
    } else {
      table[key] = value;
    }
  }
  return table;
}

/**
 * Recursive merge where `override` wins: tables merge key by key, anything
 * else (scalars, arrays, a table meeting a scalar) is replaced outright.
 */
export function deepMerge(base: TomlTable, override: TomlTable): TomlTable {
  const merged: TomlTable = { ...base };
  for (const [key, value] of Object.entries(override)) {
    const current = merged[key];
    merged[key] = isTable(current) && isTable(value) ? deepMerge(current, value) : value;
  }
  return merged;
}
