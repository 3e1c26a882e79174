import fs from "fs/promises";
import path from "path";
import { z } from "zod";
import type { SheetRecord } from "../types/records";
import { logger } from "../util/logger";
import { normalizeLocationRecord } from "./normalize";
import type { RecordLoader } from "./types";

const cellValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

const tableFileSchema = z.array(z.record(z.string(), cellValueSchema));

export const TABLE_FILES = {
  plants: "plants.json",
  locations: "locations.json",
  containers: "containers.json",
} as const;

/**
 * Reads each table from a JSON file in `dataDir`. Every file holds an array
 * of flat objects whose values are strings, numbers, booleans or null.
 */
export class JsonFileRecordLoader implements RecordLoader {
  constructor(private readonly dataDir: string) {}

  private async readTable(fileName: string): Promise<SheetRecord[]> {
    const filePath = path.join(this.dataDir, fileName);
    const content = await fs.readFile(filePath, "utf-8");
    const parsed = tableFileSchema.safeParse(JSON.parse(content));
    if (!parsed.success) {
      logger.error(
        { filePath, issues: parsed.error.issues },
        "Invalid table file",
      );
      throw new Error(`Invalid table file ${filePath}: ${parsed.error.message}`);
    }
    return parsed.data;
  }

  async loadPlants() {
    return this.readTable(TABLE_FILES.plants);
  }

  async loadLocations() {
    const locations = await this.readTable(TABLE_FILES.locations);
    return locations.map(normalizeLocationRecord);
  }

  async loadContainers() {
    return this.readTable(TABLE_FILES.containers);
  }
}
