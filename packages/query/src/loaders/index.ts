import type { ServiceConfig } from "../config";
import { logger } from "../util/logger";
import { CachedRecordLoader } from "./cache";
import { JsonFileRecordLoader } from "./jsonFile";
import { SheetsRecordLoader } from "./sheets";
import type { RecordLoader } from "./types";

export { CachedRecordLoader } from "./cache";
export { JsonFileRecordLoader } from "./jsonFile";
export { SheetsRecordLoader, DEFAULT_SHEET_RANGES } from "./sheets";
export { StaticRecordLoader } from "./static";
export type { RecordLoader } from "./types";

function createSourceLoader(config: ServiceConfig): RecordLoader {
  switch (config.DATA_SOURCE) {
    case "sheets":
      return new SheetsRecordLoader({
        spreadsheetId: config.GOOGLE_SHEETS_SPREADSHEET_ID,
        apiKey: config.GOOGLE_SHEETS_API_KEY,
        ranges: {
          plants: config.PLANTS_RANGE,
          locations: config.LOCATIONS_RANGE,
          containers: config.CONTAINERS_RANGE,
        },
      });
    case "json":
      return new JsonFileRecordLoader(config.PLANT_DATA_DIR);
  }
}

export function createRecordLoader(config: ServiceConfig): RecordLoader {
  const source = createSourceLoader(config);
  logger.info(
    { dataSource: config.DATA_SOURCE, cacheTtlSeconds: config.CACHE_TTL_SECONDS },
    "Configured record loader",
  );
  return new CachedRecordLoader(source, config.CACHE_TTL_SECONDS * 1000);
}
