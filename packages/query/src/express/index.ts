import { Router } from "express";
import type { Request, RequestHandler, Response } from "express";
import packageJson from "../../package.json";
import { env } from "../env";
import type { RecordLoader } from "../loaders/types";
import { executeAdvancedQuery } from "../operations/execute";
import { parseAdvancedQuery } from "../operations/parse";
import type { SortMode } from "../operations/sort";
import type { PlantContextResolver } from "../operations/types";
import {
  defaultFieldRegistry,
  type FieldRegistry,
} from "../schema/fieldRegistry";
import { checkLoaderHealth } from "../util/healthCheck";
import { logger } from "../util/logger";
import { QueryExecutionError, QueryParseError } from "../util/queryErrors";
import { authenticated } from "./middlewares";

export const GARDEN_QUERY_ENDPOINT = "/api/garden/query";

export const EXAMPLE_QUERY = {
  filters: {
    plants: { plant_name: { $regex: "vinca" } },
    locations: { location_name: { $in: ["patio", "front porch"] } },
    containers: { container_size: { $eq: "small" } },
  },
  join: "AND",
  include: ["plants", "locations", "containers"],
  response_format: "summary",
  limit: 20,
  sort: [{ field: "plant_name", direction: "asc" }],
};

export interface PlantQueryOptions {
  loader: RecordLoader;
  contextResolver?: PlantContextResolver;
  registry?: FieldRegistry;
  /** Defaults to API_KEY from the environment. */
  apiKey?: string;
  sortMode?: SortMode;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function createGardenQueryHandler(
  options: Omit<PlantQueryOptions, "apiKey">,
): RequestHandler {
  const registry = options.registry ?? defaultFieldRegistry;
  const sortMode = options.sortMode ?? env.SORT_MODE;

  return async (req: Request, res: Response) => {
    const startTime = Date.now();
    const body: unknown = req.body;

    if (!isPlainObject(body) || Object.keys(body).length === 0) {
      logger.warn(`POST ${GARDEN_QUERY_ENDPOINT} - Missing request body`);
      res
        .status(400)
        .json({ error: "Request body required", example: EXAMPLE_QUERY });
      return;
    }

    try {
      const plan = parseAdvancedQuery(body, registry);
      const response = await executeAdvancedQuery(plan, {
        loader: options.loader,
        contextResolver: options.contextResolver,
        sortMode,
      });

      const duration = Date.now() - startTime;
      logger.info(
        { duration, totalMatches: response.query_metadata.total_matches },
        `POST ${GARDEN_QUERY_ENDPOINT} - Query completed in ${duration}ms`,
      );
      res.status(200).json({
        ...response,
        endpoint_metadata: { endpoint: GARDEN_QUERY_ENDPOINT, duration },
      });
    } catch (error) {
      const duration = Date.now() - startTime;
      if (error instanceof QueryParseError) {
        logger.warn(
          { duration, error: error.details },
          `POST ${GARDEN_QUERY_ENDPOINT} - Invalid query after ${duration}ms`,
        );
        res.status(400).json({ error: error.details });
        return;
      }
      if (error instanceof QueryExecutionError) {
        logger.error(
          { duration, error: error.details, stage: error.details.stage },
          `POST ${GARDEN_QUERY_ENDPOINT} - Query execution failed after ${duration}ms`,
        );
        res.status(500).json({ error: error.details });
        return;
      }
      logger.error(
        { error, duration },
        `POST ${GARDEN_QUERY_ENDPOINT} - Query failed after ${duration}ms`,
      );
      res.status(500).json({ error: "Failed to execute query" });
    }
  };
}

export function createHealthHandler(loader: RecordLoader): RequestHandler {
  return async (_req: Request, res: Response) => {
    const startedAt = Date.now();
    try {
      await checkLoaderHealth(loader);
      res.status(200).json({ ok: true, duration: Date.now() - startedAt });
    } catch (error) {
      logger.error({ error }, "GET /healthz - health check failed");
      res
        .status(503)
        .json({ ok: false, error: "Data source health check failed" });
    }
  };
}

export async function plantQuery(options: PlantQueryOptions): Promise<Router> {
  const router = Router();
  const registry = options.registry ?? defaultFieldRegistry;

  router.get("/healthz", createHealthHandler(options.loader));

  router.use(authenticated(options.apiKey ?? env.API_KEY));

  try {
    logger.info("Running data source health check");
    const counts = await checkLoaderHealth(options.loader);
    logger.info(counts, "Data source health check succeeded");
  } catch (error) {
    logger.error(
      { error },
      "Data source health check failed - aborting startup",
    );
    throw error;
  }

  router.get("/version", (_req: Request, res: Response) => {
    res.json({ version: packageJson.version });
  });

  router.get("/api/garden/fields", (_req: Request, res: Response) => {
    res.json(registry.describe());
  });

  router.post(GARDEN_QUERY_ENDPOINT, createGardenQueryHandler(options));

  return router;
}
