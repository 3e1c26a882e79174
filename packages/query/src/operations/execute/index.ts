import type { QueryResponse, TableName } from "@plantdb/types";
import { TABLE_NAMES, type QueryPlan } from "../../types/querySchema";
import type { TableSnapshot } from "../../types/records";
import { logger } from "../../util/logger";
import { filterTable } from "../filter";
import { formatQueryResponse } from "../format";
import { joinFilteredData } from "../join";
import { applyLimit, applySorting } from "../sort";
import type { ExecutionContext } from "../types";
import { runStage } from "../utils/runStage";

async function loadSnapshot(ctx: ExecutionContext): Promise<TableSnapshot> {
  const [plants, locations, containers] = await Promise.all([
    ctx.loader.loadPlants(),
    ctx.loader.loadLocations(),
    ctx.loader.loadContainers(),
  ]);
  logger.debug(
    {
      plants: plants.length,
      locations: locations.length,
      containers: containers.length,
    },
    "Loaded table snapshot",
  );
  return { plants, locations, containers };
}

/**
 * Applies each table's conditions. Tables the query does not filter pass
 * through whole so they still take part in the join.
 */
export function applyAllFilters(
  snapshot: TableSnapshot,
  plan: QueryPlan,
): TableSnapshot {
  const { filters, joinType } = plan;
  const filtered: TableSnapshot = {
    plants: filterTable(snapshot.plants, filters.plants ?? [], joinType),
    locations: filterTable(
      snapshot.locations,
      filters.locations ?? [],
      joinType,
    ),
    containers: filterTable(
      snapshot.containers,
      filters.containers ?? [],
      joinType,
    ),
  };
  for (const table of TABLE_NAMES) {
    if (filters[table]) {
      logger.debug(
        { table, before: snapshot[table].length, after: filtered[table].length },
        "Filtered table",
      );
    }
  }
  return filtered;
}

export function getQueriedTables(plan: QueryPlan): TableName[] {
  return TABLE_NAMES.filter((table) => plan.filters[table] !== undefined);
}

/** Tables with at least one condition; their joins become required. */
export function getRequiredTables(plan: QueryPlan): Set<TableName> {
  return new Set(
    TABLE_NAMES.filter((table) => (plan.filters[table] ?? []).length > 0),
  );
}

/**
 * Runs a parsed query: load, filter, join, sort, limit, format. Throws
 * QueryExecutionError when any stage fails.
 */
export async function executeAdvancedQuery(
  plan: QueryPlan,
  ctx: ExecutionContext,
): Promise<QueryResponse> {
  const tablesQueried = getQueriedTables(plan);
  logger.info(
    { tables: tablesQueried, responseFormat: plan.responseFormat },
    "Executing advanced query",
  );

  const snapshot = await runStage("load", () => loadSnapshot(ctx));
  const filtered = await runStage("filter", () =>
    applyAllFilters(snapshot, plan),
  );
  let results = await runStage("join", () =>
    joinFilteredData(filtered, getRequiredTables(plan)),
  );
  if (plan.sort.length > 0) {
    results = await runStage("sort", () =>
      applySorting(results, plan.sort, ctx.sortMode),
    );
  }
  results = applyLimit(results, plan.limit);

  const formatted = await runStage("format", () =>
    formatQueryResponse(
      results,
      plan.responseFormat,
      plan.include,
      ctx.contextResolver,
    ),
  );

  logger.info({ totalMatches: results.length }, "Advanced query completed");
  return {
    ...formatted,
    query_metadata: {
      total_matches: results.length,
      applied_limit: plan.limit,
      response_format: plan.responseFormat,
      tables_queried: tablesQueried,
      execution_success: true,
    },
  };
}
