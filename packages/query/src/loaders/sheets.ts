import axios, { type AxiosInstance } from "axios";
import { z } from "zod";
import type { CellValue, SheetRecord } from "../types/records";
import { logger } from "../util/logger";
import {
  normalizeLocationRecord,
  rowsToRecords,
  type HeaderStyle,
} from "./normalize";
import type { RecordLoader } from "./types";

const SHEETS_API_URL = "https://sheets.googleapis.com/v4/spreadsheets";

const valueRangeSchema = z.object({
  range: z.string().optional(),
  values: z
    .array(z.array(z.union([z.string(), z.number(), z.boolean(), z.null()])))
    .optional(),
});

export interface SheetRanges {
  plants: string;
  locations: string;
  containers: string;
}

export const DEFAULT_SHEET_RANGES: SheetRanges = {
  plants: "Plants!A:Q",
  locations: "Locations!A:H",
  containers: "Containers!A:F",
};

export interface SheetsRecordLoaderOptions {
  spreadsheetId: string;
  apiKey: string;
  ranges?: Partial<SheetRanges>;
  http?: AxiosInstance;
}

/**
 * Reads the three tables through the Google Sheets values API. Location and
 * container headers are converted to snake_case; plant headers are kept.
 */
export class SheetsRecordLoader implements RecordLoader {
  private readonly http: AxiosInstance;
  private readonly ranges: SheetRanges;

  constructor(private readonly options: SheetsRecordLoaderOptions) {
    this.http = options.http ?? axios.create({ timeout: 15_000 });
    this.ranges = { ...DEFAULT_SHEET_RANGES, ...options.ranges };
  }

  private async fetchValues(range: string): Promise<CellValue[][]> {
    const url = `${SHEETS_API_URL}/${encodeURIComponent(
      this.options.spreadsheetId,
    )}/values/${encodeURIComponent(range)}`;
    const response = await this.http.get<unknown>(url, {
      params: { key: this.options.apiKey },
    });
    const body = valueRangeSchema.parse(response.data);
    return body.values ?? [];
  }

  private async loadTable(
    range: string,
    idColumn: string,
    headerStyle: HeaderStyle,
  ): Promise<SheetRecord[]> {
    const values = await this.fetchValues(range);
    const records = rowsToRecords(values, { idColumn, headerStyle });
    logger.debug({ range, rows: records.length }, "Loaded sheet range");
    return records;
  }

  async loadPlants() {
    return this.loadTable(this.ranges.plants, "ID", "sheet");
  }

  async loadLocations() {
    const locations = await this.loadTable(
      this.ranges.locations,
      "location_id",
      "snake_case",
    );
    return locations.map(normalizeLocationRecord);
  }

  async loadContainers() {
    return this.loadTable(
      this.ranges.containers,
      "container_id",
      "snake_case",
    );
  }
}
