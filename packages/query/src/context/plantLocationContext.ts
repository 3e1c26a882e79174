import type { PlantLocationContext } from "@plantdb/types";
import type { RecordLoader } from "../loaders/types";
import { sunHours, totalSunHours } from "../loaders/normalize";
import type { PlantContextResolver } from "../operations/types";
import type {
  CellValue,
  ContainerRecord,
  LocationRecord,
} from "../types/records";
import { toText } from "../util/fieldValues";
import { logger } from "../util/logger";

type CareComplexity = PlantLocationContext["context"]["care_complexity"];

function lower(value: CellValue | undefined): string {
  return toText(value).toLowerCase();
}

export function assessCareComplexity(
  container: ContainerRecord,
  location: LocationRecord,
): CareComplexity {
  let points = 0;
  const total = totalSunHours(location);

  if (total > 8) {
    points += 2;
  } else if (total > 6) {
    points += 1;
  }
  if (
    lower(container.container_material) === "plastic" &&
    sunHours(location, "afternoon_sun_hours") > 2
  ) {
    points += 1;
  }
  if (lower(container.container_size) === "small") {
    points += 1;
  }
  if (lower(location.microclimate_conditions).includes("facing")) {
    points += 1;
  }

  if (points >= 4) return "high";
  if (points >= 2) return "medium";
  return "low";
}

export function getPriorityConsiderations(
  container: ContainerRecord,
  location: LocationRecord,
): string[] {
  const considerations: string[] = [];
  const plastic = lower(container.container_material) === "plastic";

  if (plastic && sunHours(location, "afternoon_sun_hours") > 2) {
    considerations.push("Morning watering preferred to prevent root heating");
  }
  if (totalSunHours(location) > 7) {
    considerations.push("Daily watering checks during hot weather");
  }
  if (lower(container.container_size) === "small") {
    considerations.push(
      "Frequent moisture monitoring due to small container size",
    );
  }
  if (sunHours(location, "evening_sun_hours") > 2) {
    considerations.push(
      "Water early morning to prepare for evening heat stress",
    );
  }
  if (lower(location.microclimate_conditions).includes("north")) {
    considerations.push(
      "Cooler microclimate - adjust watering frequency accordingly",
    );
  }
  return considerations;
}

export function buildPlantLocationContext(
  container: ContainerRecord,
  location: LocationRecord,
): PlantLocationContext {
  const type = toText(container.container_type);
  const size = toText(container.container_size);
  const material = toText(container.container_material);
  return {
    container,
    location,
    context: {
      placement_description: `${type} (${size}, ${material}) in ${toText(location.location_name)}`,
      sun_exposure_summary: `${totalSunHours(location)} total hours (${toText(location.shade_pattern)})`,
      care_complexity: assessCareComplexity(container, location),
      priority_considerations: getPriorityConsiderations(container, location),
    },
  };
}

/**
 * Describes every container a plant sits in together with the location the
 * container is placed at. Containers pointing at an unknown location are
 * skipped.
 */
export class LoaderPlantContextResolver implements PlantContextResolver {
  constructor(private readonly loader: RecordLoader) {}

  async resolvePlantContext(plantId: string): Promise<PlantLocationContext[]> {
    // Containers with a blank plant_id belong to no plant
    const wanted = plantId.trim();
    if (wanted === "") {
      return [];
    }

    const [containers, locations] = await Promise.all([
      this.loader.loadContainers(),
      this.loader.loadLocations(),
    ]);

    const plantContainers = containers.filter(
      (container) => toText(container.plant_id).trim() === wanted,
    );
    if (plantContainers.length === 0) {
      logger.debug({ plantId }, "No containers found for plant");
      return [];
    }

    const locationsById = new Map(
      locations.map((location) => [toText(location.location_id), location]),
    );

    const contexts: PlantLocationContext[] = [];
    for (const container of plantContainers) {
      const location = locationsById.get(toText(container.location_id));
      if (!location) {
        logger.warn(
          {
            plantId,
            containerId: container.container_id,
            locationId: container.location_id,
          },
          "Container references an unknown location",
        );
        continue;
      }
      contexts.push(buildPlantLocationContext(container, location));
    }
    return contexts;
  }
}
