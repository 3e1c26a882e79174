import type {
  DetailedPlant,
  DetailedResponse,
  FormattedResponse,
  IdsOnlyResponse,
  IncludeSection,
  MinimalResponse,
  PlantLocationContext,
  ResponseFormat,
  SamplePlant,
  SummaryResponse,
} from "@plantdb/types";
import type {
  JoinedResult,
  LocationRecord,
  PlantRecord,
} from "../../types/records";
import { toText } from "../../util/fieldValues";
import { logger } from "../../util/logger";
import type { PlantContextResolver } from "../types";

const SAMPLE_SIZE = 5;

export function getPlantName(plant: PlantRecord): string {
  return toText(plant.plant_name) || toText(plant["Plant Name"]) || "Unknown";
}

export function getLocationName(location: LocationRecord | null): string | null {
  if (!location) {
    return null;
  }
  return toText(location.location_name) || null;
}

function increment(counts: Map<string, number>, key: string): void {
  counts.set(key, (counts.get(key) ?? 0) + 1);
}

export function formatIdsOnly(results: JoinedResult[]): IdsOnlyResponse {
  return {
    plant_ids: results.map((result) => result.plant_id),
    total_matches: results.length,
  };
}

export function formatMinimal(results: JoinedResult[]): MinimalResponse {
  return {
    plants: results.map((result) => ({
      plant_id: result.plant_id,
      plant_name: getPlantName(result.plant_data),
      location: getLocationName(result.location_data),
    })),
    total_matches: results.length,
  };
}

function toSamplePlant(result: JoinedResult): SamplePlant {
  return {
    plant_id: result.plant_id,
    plant_name: getPlantName(result.plant_data),
    location: getLocationName(result.location_data),
    containers: result.containers.map((container) => ({
      type: container.container_type ?? null,
      size: container.container_size ?? null,
      material: container.container_material ?? null,
    })),
  };
}

export function formatSummary(results: JoinedResult[]): SummaryResponse {
  const byPlantType = new Map<string, number>();
  const byContainer = new Map<string, number>();
  const byLocation = new Map<string, number>();

  for (const result of results) {
    increment(byPlantType, getPlantName(result.plant_data));

    for (const container of result.containers) {
      const descriptor =
        `${toText(container.container_size)} ${toText(container.container_material)}`.trim();
      if (descriptor) {
        increment(byContainer, descriptor);
      }
    }

    const locationName = getLocationName(result.location_data);
    if (locationName) {
      increment(byLocation, locationName);
    }
  }

  return {
    total_matches: results.length,
    summary: {
      by_plant_type: Object.fromEntries(byPlantType),
      by_container: Object.fromEntries(byContainer),
      by_location: Object.fromEntries(byLocation),
    },
    sample_plants: results.slice(0, SAMPLE_SIZE).map(toSamplePlant),
    response_format: "summary",
  };
}

async function resolveContextSafely(
  resolver: PlantContextResolver | undefined,
  plantId: string,
): Promise<PlantLocationContext[] | null> {
  if (!resolver) {
    return null;
  }
  try {
    return await resolver.resolvePlantContext(plantId);
  } catch (error) {
    logger.warn({ plantId, error }, "Could not resolve plant context");
    return null;
  }
}

export async function formatDetailed(
  results: JoinedResult[],
  include: IncludeSection[],
  contextResolver?: PlantContextResolver,
): Promise<DetailedResponse> {
  const sections = new Set(include);
  const plants: DetailedPlant[] = [];

  for (const result of results) {
    const plant: DetailedPlant = { plant_id: result.plant_id };
    if (sections.has("plants")) {
      plant.plant_data = result.plant_data;
    }
    if (sections.has("locations")) {
      plant.location_data = result.location_data;
    }
    if (sections.has("containers")) {
      plant.containers = result.containers;
    }
    if (sections.has("context")) {
      plant.context = await resolveContextSafely(
        contextResolver,
        result.plant_id,
      );
    }
    plants.push(plant);
  }

  return {
    plants,
    total_matches: results.length,
    response_format: "detailed",
  };
}

export async function formatQueryResponse(
  results: JoinedResult[],
  responseFormat: ResponseFormat,
  include: IncludeSection[],
  contextResolver?: PlantContextResolver,
): Promise<FormattedResponse> {
  switch (responseFormat) {
    case "ids_only":
      return formatIdsOnly(results);
    case "minimal":
      return formatMinimal(results);
    case "summary":
      return formatSummary(results);
    case "detailed":
      return formatDetailed(results, include, contextResolver);
  }
}
