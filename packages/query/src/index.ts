export { parseAdvancedQuery, safeParseAdvancedQuery } from "./operations/parse";
export type { ParseResult } from "./operations/parse";
export {
  executeAdvancedQuery,
  applyAllFilters,
  getQueriedTables,
  getRequiredTables,
} from "./operations/execute";
export { filterTable, evaluateCondition, applyOperator } from "./operations/filter";
export { joinFilteredData } from "./operations/join";
export {
  applySorting,
  applyLimit,
  compareSortKeys,
  getSortKey,
  SORT_MODES,
} from "./operations/sort";
export type { SortMode } from "./operations/sort";
export { formatQueryResponse } from "./operations/format";
export type {
  ExecutionContext,
  PlantContextResolver,
} from "./operations/types";
export {
  FieldRegistry,
  createFieldRegistry,
  defaultFieldRegistry,
} from "./schema/fieldRegistry";
export {
  LoaderPlantContextResolver,
  buildPlantLocationContext,
} from "./context/plantLocationContext";
export * from "./loaders";
export { parseEnv, envSchema } from "./config";
export type { ServiceConfig } from "./config";
export { plantQuery, createGardenQueryHandler } from "./express";
export type { PlantQueryOptions } from "./express";
export { QueryParseError, QueryExecutionError } from "./util/queryErrors";
export type {
  QueryPlan,
  FilterCondition,
  SortSpec,
  AdvancedQueryRequest,
} from "./types/querySchema";
export type * from "./types/records";
