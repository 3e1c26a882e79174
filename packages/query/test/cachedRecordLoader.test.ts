import { CachedRecordLoader } from "~/loaders/cache";
import type { RecordLoader } from "~/loaders/types";

function countingLoader() {
  const loader = {
    loadPlants: jest.fn().mockResolvedValue([{ ID: "1" }]),
    loadLocations: jest.fn().mockResolvedValue([]),
    loadContainers: jest.fn().mockResolvedValue([]),
  };
  return loader satisfies RecordLoader;
}

describe("CachedRecordLoader", () => {
  test("serves repeated reads from the cache within the TTL", async () => {
    const inner = countingLoader();
    let now = 1_000;
    const loader = new CachedRecordLoader(inner, 60_000, () => now);

    await loader.loadPlants();
    now += 59_999;
    const plants = await loader.loadPlants();

    expect(plants).toEqual([{ ID: "1" }]);
    expect(inner.loadPlants).toHaveBeenCalledTimes(1);
  });

  test("reloads once the TTL has passed", async () => {
    const inner = countingLoader();
    let now = 1_000;
    const loader = new CachedRecordLoader(inner, 60_000, () => now);

    await loader.loadPlants();
    now += 60_000;
    await loader.loadPlants();

    expect(inner.loadPlants).toHaveBeenCalledTimes(2);
  });

  test("concurrent reads share one load", async () => {
    const inner = countingLoader();
    const loader = new CachedRecordLoader(inner, 60_000);

    const [first, second] = await Promise.all([
      loader.loadPlants(),
      loader.loadPlants(),
    ]);

    expect(first).toBe(second);
    expect(inner.loadPlants).toHaveBeenCalledTimes(1);
  });

  test("caches each table separately", async () => {
    const inner = countingLoader();
    const loader = new CachedRecordLoader(inner, 60_000);

    await loader.loadPlants();
    await loader.loadLocations();
    await loader.loadLocations();

    expect(inner.loadPlants).toHaveBeenCalledTimes(1);
    expect(inner.loadLocations).toHaveBeenCalledTimes(1);
    expect(inner.loadContainers).not.toHaveBeenCalled();
  });

  test("clear forces a reload", async () => {
    const inner = countingLoader();
    const loader = new CachedRecordLoader(inner, 60_000);

    await loader.loadContainers();
    loader.clear();
    await loader.loadContainers();

    expect(inner.loadContainers).toHaveBeenCalledTimes(2);
  });

  test("a TTL of 0 disables caching", async () => {
    const inner = countingLoader();
    const loader = new CachedRecordLoader(inner, 0);

    await loader.loadPlants();
    await loader.loadPlants();

    expect(inner.loadPlants).toHaveBeenCalledTimes(2);
  });

  test("does not cache failed loads", async () => {
    const inner = countingLoader();
    inner.loadPlants.mockRejectedValueOnce(new Error("quota exceeded"));
    const loader = new CachedRecordLoader(inner, 60_000);

    await expect(loader.loadPlants()).rejects.toThrow("quota exceeded");
    await expect(loader.loadPlants()).resolves.toEqual([{ ID: "1" }]);
    expect(inner.loadPlants).toHaveBeenCalledTimes(2);
  });
});
