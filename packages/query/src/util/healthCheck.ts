import type { RecordLoader } from "../loaders/types";

const HEALTHCHECK_TIMEOUT_MS = 5_000;

export interface LoaderHealth {
  plants: number;
  locations: number;
  containers: number;
}

async function loadAllTables(loader: RecordLoader): Promise<LoaderHealth> {
  const [plants, locations, containers] = await Promise.all([
    loader.loadPlants(),
    loader.loadLocations(),
    loader.loadContainers(),
  ]);
  return {
    plants: plants.length,
    locations: locations.length,
    containers: containers.length,
  };
}

// Reads every table once to make sure the data source is reachable before we start serving traffic.
export async function checkLoaderHealth(
  loader: RecordLoader,
  timeoutMs: number = HEALTHCHECK_TIMEOUT_MS,
): Promise<LoaderHealth> {
  const healthCheckPromise = loadAllTables(loader);

  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    return healthCheckPromise;
  }

  let timer: NodeJS.Timeout | undefined;
  try {
    return await Promise.race([
      healthCheckPromise,
      new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
          reject(
            Object.assign(
              new Error(
                `Data source health check timed out after ${timeoutMs}ms`,
              ),
              { code: "DATA_SOURCE_HEALTHCHECK_TIMEOUT" },
            ),
          );
        }, timeoutMs);
      }),
    ]);
  } finally {
    clearTimeout(timer);
  }
}
