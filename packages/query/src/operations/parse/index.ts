import {
  defaultFieldRegistry,
  type FieldRegistry,
} from "../../schema/fieldRegistry";
import {
  buildAdvancedQuerySchema,
  type QueryPlan,
} from "../../types/querySchema";
import { logger } from "../../util/logger";
import { QueryParseError } from "../../util/queryErrors";

export type ParseResult =
  | { success: true; data: QueryPlan }
  | { success: false; error: QueryParseError };

const schemaCache = new WeakMap<
  FieldRegistry,
  ReturnType<typeof buildAdvancedQuerySchema>
>();

function getQuerySchema(registry: FieldRegistry) {
  let schema = schemaCache.get(registry);
  if (!schema) {
    schema = buildAdvancedQuerySchema(registry);
    schemaCache.set(registry, schema);
  }
  return schema;
}

export function safeParseAdvancedQuery(
  rawQuery: unknown,
  registry: FieldRegistry = defaultFieldRegistry,
): ParseResult {
  const result = getQuerySchema(registry).safeParse(rawQuery);
  if (result.success) {
    return { success: true, data: result.data };
  }

  const [issue] = result.error.issues;
  const path = issue ? issue.path : [];
  const message = `Query parsing failed: ${issue ? issue.message : "invalid query"}`;
  logger.warn({ path, issues: result.error.issues }, message);
  return {
    success: false,
    error: new QueryParseError(
      { type: "query_parse", message, path },
      result.error,
    ),
  };
}

/**
 * Validates a raw advanced query and normalizes it into a plan.
 * Throws QueryParseError describing the first invalid value.
 */
export function parseAdvancedQuery(
  rawQuery: unknown,
  registry: FieldRegistry = defaultFieldRegistry,
): QueryPlan {
  const result = safeParseAdvancedQuery(rawQuery, registry);
  if (!result.success) {
    throw result.error;
  }
  return result.data;
}
