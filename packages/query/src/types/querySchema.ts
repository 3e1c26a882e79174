import { z } from "zod";
import type {
  IncludeSection,
  JoinType,
  ResponseFormat,
  SortDirection,
  TableName,
} from "@plantdb/types";
import {
  defaultFieldRegistry,
  type FieldRegistry,
} from "../schema/fieldRegistry";
import { toFloat } from "../util/fieldValues";
import { compileRegex, type RegexValue } from "../util/regex";

export const TABLE_NAMES = ["plants", "locations", "containers"] as const;
export const INCLUDE_SECTIONS = [...TABLE_NAMES, "context"] as const;
export const RESPONSE_FORMATS = [
  "summary",
  "detailed",
  "minimal",
  "ids_only",
] as const;
export const JOIN_TYPES = ["AND", "OR"] as const;
export const SORT_DIRECTIONS = ["asc", "desc"] as const;

export const QUERY_OPERATORS = [
  "$eq",
  "$ne",
  "$in",
  "$nin",
  "$gt",
  "$gte",
  "$lt",
  "$lte",
  "$regex",
  "$exists",
  "$contains",
] as const;

export type QueryOperator = (typeof QUERY_OPERATORS)[number];

export type ScalarValue = string | number | boolean | null;

export type ConditionOperand =
  | { operator: "$eq" | "$ne" | "$contains"; value: ScalarValue }
  | { operator: "$in" | "$nin"; value: ScalarValue[] }
  | { operator: "$gt" | "$gte" | "$lt" | "$lte"; value: number | string }
  | { operator: "$regex"; value: RegexValue }
  | { operator: "$exists"; value: boolean };

export type FilterCondition = {
  table: TableName;
  /** Canonical column name from the field registry. */
  field: string;
} & ConditionOperand;

export type ParsedFilters = Partial<Record<TableName, FilterCondition[]>>;

export type SortSpec = {
  field: string;
  direction: SortDirection;
};

export interface QueryPlan {
  filters: ParsedFilters;
  joinType: JoinType;
  include: IncludeSection[];
  responseFormat: ResponseFormat;
  limit: number;
  sort: SortSpec[];
}

type Parsed<T> =
  | { ok: true; value: T }
  | { ok: false; message: string; path: string[] };

function ok<T>(value: T): Parsed<T> {
  return { ok: true, value };
}

function fail<T>(message: string, path: string[] = []): Parsed<T> {
  return { ok: false, message, path };
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isScalar(value: unknown): value is ScalarValue {
  return (
    value === null ||
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean"
  );
}

function isTableName(value: string): value is TableName {
  return TABLE_NAMES.some((table) => table === value);
}

function isQueryOperator(value: string): value is QueryOperator {
  return QUERY_OPERATORS.some((operator) => operator === value);
}

function describeType(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "list";
  return typeof value;
}

function parseRegexOperand(
  pattern: unknown,
  options: unknown,
): Parsed<ConditionOperand> {
  if (typeof pattern !== "string") {
    return fail(
      `Operator $regex requires a string value, got: ${describeType(pattern)}`,
    );
  }
  if (options !== null && typeof options !== "string") {
    return fail(
      `Operator $options requires a string value, got: ${describeType(options)}`,
    );
  }
  const value: RegexValue = { pattern, options };
  try {
    compileRegex(value);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return fail(`Invalid regex pattern: ${pattern}. Error: ${reason}`);
  }
  return ok<ConditionOperand>({ operator: "$regex", value });
}

function parseOperand(
  operator: QueryOperator,
  value: unknown,
): Parsed<ConditionOperand> {
  switch (operator) {
    case "$in":
    case "$nin":
      if (!Array.isArray(value)) {
        return fail(
          `Operator ${operator} requires a list value, got: ${describeType(value)}`,
        );
      }
      if (value.length === 0) {
        return fail(`Operator ${operator} requires a non-empty list`);
      }
      if (!value.every(isScalar)) {
        return fail(`Operator ${operator} list entries must be scalar values`);
      }
      return ok<ConditionOperand>({ operator, value });
    case "$gt":
    case "$gte":
    case "$lt":
    case "$lte":
      if (
        (typeof value !== "number" && typeof value !== "string") ||
        toFloat(value) === null
      ) {
        return fail(
          `Operator ${operator} requires a numeric value, got: ${describeType(value)}`,
        );
      }
      return ok<ConditionOperand>({ operator, value });
    case "$regex":
      return parseRegexOperand(value, null);
    case "$exists":
      if (typeof value !== "boolean") {
        return fail(
          `Operator $exists requires a boolean value, got: ${describeType(value)}`,
        );
      }
      return ok<ConditionOperand>({ operator, value });
    case "$eq":
    case "$ne":
    case "$contains":
      if (!isScalar(value)) {
        return fail(
          `Operator ${operator} requires a scalar value, got: ${describeType(value)}`,
        );
      }
      return ok<ConditionOperand>({ operator, value });
  }
}

export function parseFieldCondition(
  table: TableName,
  field: string,
  condition: unknown,
): Parsed<FilterCondition> {
  let operand: Parsed<ConditionOperand>;

  if (!isPlainObject(condition)) {
    // A bare value is an implicit $eq
    operand = isScalar(condition)
      ? ok<ConditionOperand>({ operator: "$eq", value: condition })
      : fail(
          `Field condition must be a value or an operator object, got: ${describeType(condition)}`,
        );
  } else {
    const keys = Object.keys(condition);
    if (keys.length === 2 && "$regex" in condition && "$options" in condition) {
      operand = parseRegexOperand(condition.$regex, condition.$options);
    } else if (keys.length !== 1) {
      operand = fail(
        `Field condition must contain exactly one operator, got: [${keys.join(", ")}]`,
      );
    } else {
      const [operator] = keys;
      operand = isQueryOperator(operator)
        ? parseOperand(operator, condition[operator])
        : fail(
            `Unsupported operator: ${operator}. Supported operators: ${QUERY_OPERATORS.join(", ")}`,
          );
    }
  }

  if (!operand.ok) {
    return fail(operand.message);
  }
  return ok<FilterCondition>({ table, field, ...operand.value });
}

function parseTableFilters(
  table: TableName,
  tableFilters: unknown,
  registry: FieldRegistry,
): Parsed<FilterCondition[]> {
  if (!isPlainObject(tableFilters)) {
    return fail(
      `Filters for ${table} must be an object of field conditions, got: ${describeType(tableFilters)}`,
    );
  }

  const conditions: FilterCondition[] = [];
  for (const [fieldName, condition] of Object.entries(tableFilters)) {
    const lookup = registry.canonicalize(table, fieldName);
    if (!lookup.ok) {
      return fail(lookup.message, [fieldName]);
    }
    const parsed = parseFieldCondition(table, lookup.field, condition);
    if (!parsed.ok) {
      return fail(parsed.message, [fieldName]);
    }
    conditions.push(parsed.value);
  }
  return ok(conditions);
}

function buildFiltersSchema(registry: FieldRegistry) {
  return z
    .record(z.string(), z.unknown(), {
      invalid_type_error: "Filters must be an object keyed by table name",
    })
    .transform((filters, ctx) => {
      const parsed: ParsedFilters = {};
      for (const [table, tableFilters] of Object.entries(filters)) {
        if (!isTableName(table)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `Invalid table name: ${table}. Must be one of: ${TABLE_NAMES.join(", ")}`,
            path: [table],
          });
          return z.NEVER;
        }
        const result = parseTableFilters(table, tableFilters, registry);
        if (!result.ok) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: result.message,
            path: [table, ...result.path],
          });
          return z.NEVER;
        }
        parsed[table] = result.value;
      }
      return parsed;
    });
}

const LIMIT_MESSAGE = "Limit must be an integer between 1 and 1000";

const joinSchema = z
  .string({ invalid_type_error: "Join type must be a string" })
  .transform((value) => value.toUpperCase())
  .pipe(
    z.enum(JOIN_TYPES, {
      errorMap: (_issue, ctx) => ({
        message: `Invalid join type: ${String(ctx.data)}. Must be 'AND' or 'OR'`,
      }),
    }),
  );

const includeSectionSchema = z.enum(INCLUDE_SECTIONS, {
  errorMap: (_issue, ctx) => ({
    message: `Invalid include field: ${String(ctx.data)}`,
  }),
});

const responseFormatSchema = z.enum(RESPONSE_FORMATS, {
  errorMap: (_issue, ctx) => ({
    message: `Invalid response_format: ${String(ctx.data)}. Must be one of: ${RESPONSE_FORMATS.join(", ")}`,
  }),
});

const limitSchema = z
  .number({ invalid_type_error: LIMIT_MESSAGE })
  .int(LIMIT_MESSAGE)
  .min(1, LIMIT_MESSAGE)
  .max(1000, LIMIT_MESSAGE);

// Sort fields are not checked against any table: an unknown field sorts
// every result as an empty value.
const sortSpecSchema = z.object(
  {
    field: z.string({
      required_error: "Sort specification must include 'field'",
      invalid_type_error: "Sort field must be a string",
    }),
    direction: z
      .string({ invalid_type_error: "Sort direction must be a string" })
      .transform((value) => value.toLowerCase())
      .pipe(
        z.enum(SORT_DIRECTIONS, {
          errorMap: (_issue, ctx) => ({
            message: `Sort direction must be 'asc' or 'desc', got: ${String(ctx.data)}`,
          }),
        }),
      )
      .default("asc"),
  },
  { invalid_type_error: "Each sort specification must be an object" },
);

export function buildAdvancedQuerySchema(
  registry: FieldRegistry = defaultFieldRegistry,
) {
  return z
    .object(
      {
        filters: buildFiltersSchema(registry).default({}),
        join: joinSchema.default("AND"),
        include: z
          .array(includeSectionSchema, {
            invalid_type_error: "Include must be a list",
          })
          .default([...TABLE_NAMES]),
        response_format: responseFormatSchema.default("summary"),
        limit: limitSchema.default(50),
        sort: z
          .array(sortSpecSchema, {
            invalid_type_error: "Sort options must be a list",
          })
          .default([]),
      },
      { invalid_type_error: "Query must be a JSON object" },
    )
    .transform(
      (query): QueryPlan => ({
        filters: query.filters,
        joinType: query.join,
        include: query.include,
        responseFormat: query.response_format,
        limit: query.limit,
        sort: query.sort,
      }),
    );
}

export type AdvancedQueryRequest = z.input<
  ReturnType<typeof buildAdvancedQuerySchema>
>;
