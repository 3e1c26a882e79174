import fs from "fs/promises";
import os from "os";
import path from "path";
import { JsonFileRecordLoader } from "~/loaders/jsonFile";

describe("JsonFileRecordLoader", () => {
  let dataDir: string;

  beforeEach(async () => {
    dataDir = await fs.mkdtemp(path.join(os.tmpdir(), "plant-data-"));
  });

  afterEach(async () => {
    await fs.rm(dataDir, { recursive: true, force: true });
  });

  async function writeTable(fileName: string, rows: unknown): Promise<void> {
    await fs.writeFile(path.join(dataDir, fileName), JSON.stringify(rows));
  }

  test("reads each table from its own file", async () => {
    await writeTable("plants.json", [{ ID: "1", "Plant Name": "Vinca" }]);
    await writeTable("locations.json", [
      { location_id: "L1", morning_sun_hours: 2, afternoon_sun_hours: 3 },
    ]);
    await writeTable("containers.json", [
      { container_id: "C1", plant_id: "1", location_id: null },
    ]);
    const loader = new JsonFileRecordLoader(dataDir);

    expect(await loader.loadPlants()).toEqual([{ ID: "1", "Plant Name": "Vinca" }]);
    expect(await loader.loadLocations()).toEqual([
      {
        location_id: "L1",
        morning_sun_hours: 2,
        afternoon_sun_hours: 3,
        total_sun_hours: 5,
      },
    ]);
    expect(await loader.loadContainers()).toEqual([
      { container_id: "C1", plant_id: "1", location_id: null },
    ]);
  });

  test("rejects nested values", async () => {
    await writeTable("plants.json", [{ ID: { nested: true } }]);
    const loader = new JsonFileRecordLoader(dataDir);

    await expect(loader.loadPlants()).rejects.toThrow(/^Invalid table file /);
  });

  test("fails when a table file is missing", async () => {
    const loader = new JsonFileRecordLoader(dataDir);

    await expect(loader.loadContainers()).rejects.toThrow(/ENOENT/);
  });
});
