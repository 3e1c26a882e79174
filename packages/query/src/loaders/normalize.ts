import type { CellValue, LocationRecord, SheetRecord } from "../types/records";
import { normalizeFieldKey, toFloat, toText } from "../util/fieldValues";

export type HeaderStyle = "sheet" | "snake_case";

const SUN_HOUR_FIELDS = [
  "morning_sun_hours",
  "afternoon_sun_hours",
  "evening_sun_hours",
] as const;

export function sunHours(
  location: LocationRecord,
  field: (typeof SUN_HOUR_FIELDS)[number],
): number {
  return toFloat(location[field]) ?? 0;
}

export function totalSunHours(location: LocationRecord): number {
  return (
    toFloat(location.total_sun_hours) ??
    sunHours(location, "morning_sun_hours") +
      sunHours(location, "afternoon_sun_hours") +
      sunHours(location, "evening_sun_hours")
  );
}

/** Fills in total_sun_hours when the sheet leaves it blank. */
export function normalizeLocationRecord(
  location: LocationRecord,
): LocationRecord {
  if (toText(location.total_sun_hours).trim() !== "") {
    return location;
  }
  if (SUN_HOUR_FIELDS.every((field) => toFloat(location[field]) === null)) {
    return location;
  }
  return { ...location, total_sun_hours: totalSunHours(location) };
}

/**
 * Turns a sheet's value grid into records keyed by the header row. Short
 * rows are padded with "" and rows whose `idColumn` is blank are skipped.
 */
export function rowsToRecords(
  values: CellValue[][],
  options: { idColumn: string; headerStyle: HeaderStyle },
): SheetRecord[] {
  const [headerRow, ...rows] = values;
  if (!headerRow) {
    return [];
  }

  const headers = headerRow.map((header) =>
    options.headerStyle === "snake_case"
      ? normalizeFieldKey(toText(header))
      : toText(header),
  );

  const records: SheetRecord[] = [];
  for (const row of rows) {
    const record: SheetRecord = {};
    headers.forEach((header, index) => {
      record[header] = index < row.length ? row[index] : "";
    });
    if (toText(record[options.idColumn]).trim() !== "") {
      records.push(record);
    }
  }
  return records;
}
