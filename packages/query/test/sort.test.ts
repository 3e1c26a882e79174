import { joinFilteredData } from "~/operations/join";
import {
  applyLimit,
  applySorting,
  compareSortKeys,
  getSortKey,
} from "~/operations/sort";
import { StaticRecordLoader } from "~/loaders/static";
import type { JoinedResult } from "~/types/records";
import { gardenSnapshot } from "./utils/fixtures";

async function joinedGarden(): Promise<JoinedResult[]> {
  const loader = new StaticRecordLoader(gardenSnapshot());
  return joinFilteredData(
    {
      plants: await loader.loadPlants(),
      locations: await loader.loadLocations(),
      containers: await loader.loadContainers(),
    },
    new Set(),
  );
}

function ids(results: JoinedResult[]): string[] {
  return results.map((result) => result.plant_id);
}

describe("sorting", () => {
  test("natural mode compares numeric keys as numbers", async () => {
    const results = await joinedGarden();

    expect(ids(applySorting(results, [{ field: "ID", direction: "asc" }]))).toEqual(
      ["1", "2", "3", "4", "10"],
    );
  });

  test("lexicographic mode compares every key as text", async () => {
    const results = await joinedGarden();

    expect(
      ids(
        applySorting(results, [{ field: "ID", direction: "asc" }], "lexicographic"),
      ),
    ).toEqual(["1", "10", "2", "3", "4"]);
  });

  test("desc keeps ties in their previous order", async () => {
    const results = await joinedGarden();

    expect(
      ids(
        applySorting(results, [{ field: "Light Requirements", direction: "desc" }]),
      ),
    ).toEqual(["3", "1", "2", "4", "10"]);
  });

  test("the first sort key dominates later keys", async () => {
    const results = await joinedGarden();

    expect(
      ids(
        applySorting(results, [
          { field: "light_requirements", direction: "asc" },
          { field: "plant_name", direction: "desc" },
        ]),
      ),
    ).toEqual(["1", "2", "10", "4", "3"]);
  });

  test("falls back to location fields and puts missing values after numbers", async () => {
    const results = await joinedGarden();

    expect(
      ids(applySorting(results, [{ field: "total_sun_hours", direction: "asc" }])),
    ).toEqual(["2", "1", "10", "3", "4"]);
  });

  test("unknown sort fields leave the order unchanged", async () => {
    const results = await joinedGarden();

    expect(
      ids(applySorting(results, [{ field: "bloom_color", direction: "desc" }])),
    ).toEqual(["1", "2", "3", "4", "10"]);
  });

  test("reads sort keys from the first container last", async () => {
    const [vinca] = await joinedGarden();

    expect(getSortKey(vinca, "container_material")).toBe("plastic");
    expect(getSortKey(vinca, "Plant Name")).toBe("vinca");
  });

  test("compareSortKeys", () => {
    expect(compareSortKeys("2", "10", "natural")).toBeLessThan(0);
    expect(compareSortKeys("2", "10", "lexicographic")).toBeGreaterThan(0);
    expect(compareSortKeys("9", "apple", "natural")).toBe(-1);
    expect(compareSortKeys("pear", "apple", "natural")).toBe(1);
    expect(compareSortKeys("0x10", "9", "natural")).toBe(1);
  });

  test("compareSortKeys treats keys beyond the float range as text", () => {
    expect(compareSortKeys("1e999", "1e999", "natural")).toBe(0);
    expect(compareSortKeys("1e999", "5", "natural")).toBe(1);
    expect(compareSortKeys("-1e999", "1e999", "natural")).toBe(-1);
  });

  test("applyLimit keeps the first results", () => {
    expect(applyLimit([1, 2, 3, 4], 3)).toEqual([1, 2, 3]);
    expect(applyLimit([1, 2], 50)).toEqual([1, 2]);
  });
});
