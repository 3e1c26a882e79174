import { joinFilteredData } from "~/operations/join";
import { gardenLocations, gardenSnapshot } from "./utils/fixtures";

describe("join engine", () => {
  test("includes plants without containers when no table is required", () => {
    const results = joinFilteredData(gardenSnapshot(), new Set());
    const basil = results.find((result) => result.plant_id === "4");

    expect(results.map((result) => result.plant_id)).toEqual([
      "1",
      "2",
      "3",
      "4",
      "10",
    ]);
    expect(basil?.containers).toEqual([]);
    expect(basil?.location_data).toBeNull();
  });

  test("drops plants without containers when containers are required", () => {
    const results = joinFilteredData(gardenSnapshot(), new Set(["containers"]));

    expect(results.map((result) => result.plant_id)).toEqual([
      "1",
      "2",
      "3",
      "10",
    ]);
  });

  test("drops plants whose location was filtered out when locations are required", () => {
    const snapshot = gardenSnapshot();
    snapshot.locations = snapshot.locations.filter(
      (location) => location.location_id === "L1",
    );

    const results = joinFilteredData(snapshot, new Set(["locations"]));

    expect(results.map((result) => result.plant_id)).toEqual(["1", "10"]);
  });

  test("places a plant at its first container's location", () => {
    const [vinca] = joinFilteredData(gardenSnapshot(), new Set());

    expect(vinca.containers.map((container) => container.container_id)).toEqual([
      "C1",
      "C5",
    ]);
    expect(vinca.location_data?.location_name).toBe("Patio");
  });

  test("falls back to the container's location name", () => {
    const results = joinFilteredData(
      {
        plants: [{ id: 7, plant_name: "Mint" }],
        locations: gardenLocations(),
        containers: [{ container_id: "C9", plant_id: 7, location_name: " patio " }],
      },
      new Set(),
    );

    expect(results).toHaveLength(1);
    expect(results[0].plant_id).toBe("7");
    expect(results[0].location_data?.location_id).toBe("L1");
  });
});
