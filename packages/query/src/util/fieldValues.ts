import type { CellValue, SheetRecord } from "../types/records";

/**
 * Lowercases a field name and turns spaces and hyphens into underscores, so
 * "Plant Name", "plant-name" and "plant_name" all compare equal.
 */
export function normalizeFieldKey(field: string): string {
  return field.trim().toLowerCase().replace(/[\s-]/g, "_");
}

// Normalized key -> first matching record key, built once per record.
const normalizedKeyIndex = new WeakMap<SheetRecord, Map<string, string>>();

function getNormalizedKeys(record: SheetRecord): Map<string, string> {
  const cached = normalizedKeyIndex.get(record);
  if (cached) {
    return cached;
  }
  const index = new Map<string, string>();
  for (const key of Object.keys(record)) {
    const normalized = normalizeFieldKey(key);
    if (!index.has(normalized)) {
      index.set(normalized, key);
    }
  }
  normalizedKeyIndex.set(record, index);
  return index;
}

/**
 * Reads a field from a record whose headers may use a different casing than
 * the canonical field name. Tries the exact key, then the snake_case key,
 * then any key with the same normalized form.
 */
export function getFieldValue(
  record: SheetRecord,
  field: string,
): CellValue | undefined {
  if (Object.prototype.hasOwnProperty.call(record, field)) {
    return record[field];
  }

  const normalized = normalizeFieldKey(field);
  if (Object.prototype.hasOwnProperty.call(record, normalized)) {
    return record[normalized];
  }

  const key = getNormalizedKeys(record).get(normalized);
  return key === undefined ? undefined : record[key];
}

export function isMissing(
  value: CellValue | undefined,
): value is null | undefined {
  return value === undefined || value === null;
}

export function isBlank(
  value: CellValue | undefined,
): value is null | undefined | "" {
  return isMissing(value) || value === "";
}

export function toText(value: CellValue | undefined): string {
  return isBlank(value) ? "" : String(value);
}

const DECIMAL_LITERAL = /^[+-]?(\d+(\.\d*)?|\.\d+)(e[+-]?\d+)?$/i;

/**
 * Parses a number the way a spreadsheet cell holds it: numbers pass through,
 * strings must be a complete decimal literal once trimmed ("0x10" is text).
 */
export function toFloat(value: unknown): number | null {
  if (typeof value === "number") {
    return Number.isNaN(value) ? null : value;
  }
  if (typeof value !== "string") {
    return null;
  }
  const trimmed = value.trim();
  if (!DECIMAL_LITERAL.test(trimmed)) {
    return null;
  }
  return Number(trimmed);
}
