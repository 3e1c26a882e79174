import type { TableName } from "@plantdb/types";
import type {
  ContainerRecord,
  JoinedResult,
  LocationRecord,
  PlantRecord,
  TableSnapshot,
} from "../../types/records";
import { isBlank, toText } from "../../util/fieldValues";

function normalizeLocationName(name: string): string {
  return name.trim().toLowerCase();
}

function resolvePlantId(plant: PlantRecord): string {
  for (const value of [plant.id, plant.ID, plant.plant_id]) {
    if (value) {
      return String(value);
    }
  }
  return "";
}

function groupContainersByPlant(
  containers: ContainerRecord[],
): Map<string, ContainerRecord[]> {
  const byPlant = new Map<string, ContainerRecord[]>();
  for (const container of containers) {
    if (isBlank(container.plant_id)) {
      continue;
    }
    const plantId = String(container.plant_id);
    const group = byPlant.get(plantId);
    if (group) {
      group.push(container);
    } else {
      byPlant.set(plantId, [container]);
    }
  }
  return byPlant;
}

/**
 * The first container in loader order decides where a plant lives: its
 * location_id is looked up first, then its location_name.
 */
function resolveLocation(
  containers: ContainerRecord[],
  locationsById: Map<string, LocationRecord>,
  locationsByName: Map<string, LocationRecord>,
): LocationRecord | null {
  const [primary] = containers;
  if (!primary) {
    return null;
  }

  const locationId = toText(primary.location_id);
  const byId = locationId ? locationsById.get(locationId) : undefined;
  if (byId) {
    return byId;
  }

  const locationName = normalizeLocationName(toText(primary.location_name));
  return (locationName && locationsByName.get(locationName)) || null;
}

/**
 * Correlates each plant with its containers and location. Tables listed in
 * `requiredTables` (the ones the query filtered) act as inner joins: plants
 * without a match there are dropped. Other relationships are optional.
 */
export function joinFilteredData(
  tables: TableSnapshot,
  requiredTables: ReadonlySet<TableName>,
): JoinedResult[] {
  const locationsById = new Map<string, LocationRecord>();
  const locationsByName = new Map<string, LocationRecord>();
  for (const location of tables.locations) {
    locationsById.set(toText(location.location_id), location);
    locationsByName.set(
      normalizeLocationName(toText(location.location_name)),
      location,
    );
  }

  const containersByPlant = groupContainersByPlant(tables.containers);
  const results: JoinedResult[] = [];

  for (const plant of tables.plants) {
    const plantId = resolvePlantId(plant);
    const containers = containersByPlant.get(plantId) ?? [];
    const location = resolveLocation(
      containers,
      locationsById,
      locationsByName,
    );

    if (requiredTables.has("containers") && containers.length === 0) {
      continue;
    }
    if (requiredTables.has("locations") && location === null) {
      continue;
    }

    results.push({
      plant_id: plantId,
      plant_data: plant,
      containers,
      location_data: location,
    });
  }

  return results;
}
