import type { JoinType } from "@plantdb/types";
import type { FilterCondition, ScalarValue } from "../../types/querySchema";
import type { CellValue, SheetRecord } from "../../types/records";
import { getFieldValue, isBlank, toFloat } from "../../util/fieldValues";
import { logger } from "../../util/logger";
import { compileRegex } from "../../util/regex";

function normalize(value: ScalarValue): string {
  return String(value).trim().toLowerCase();
}

function compareNumbers(
  operator: "$gt" | "$gte" | "$lt" | "$lte",
  actual: number,
  expected: number,
): boolean {
  switch (operator) {
    case "$gt":
      return actual > expected;
    case "$gte":
      return actual >= expected;
    case "$lt":
      return actual < expected;
    case "$lte":
      return actual <= expected;
  }
}

/**
 * Applies one operator to a cell value. String comparisons ignore case.
 * A blank cell only satisfies `$exists: false`.
 */
export function applyOperator(
  actual: CellValue | undefined,
  condition: FilterCondition,
): boolean {
  if (isBlank(actual)) {
    return condition.operator === "$exists" && !condition.value;
  }

  const actualText = String(actual).trim();
  const actualLower = actualText.toLowerCase();

  switch (condition.operator) {
    case "$eq":
      return normalize(condition.value) === actualLower;
    case "$ne":
      return normalize(condition.value) !== actualLower;
    case "$in":
      return condition.value.some((value) => normalize(value) === actualLower);
    case "$nin":
      return !condition.value.some((value) => normalize(value) === actualLower);
    case "$gt":
    case "$gte":
    case "$lt":
    case "$lte": {
      const actualNumber = toFloat(actual);
      const expectedNumber = toFloat(condition.value);
      if (actualNumber === null || expectedNumber === null) {
        return false;
      }
      return compareNumbers(condition.operator, actualNumber, expectedNumber);
    }
    case "$regex":
      return compileRegex(condition.value).test(actualText);
    case "$exists":
      return condition.value;
    case "$contains":
      return actualLower.includes(normalize(condition.value));
    default:
      logger.warn({ condition }, "Unknown filter operator");
      return false;
  }
}

export function evaluateCondition(
  record: SheetRecord,
  condition: FilterCondition,
): boolean {
  return applyOperator(getFieldValue(record, condition.field), condition);
}

/**
 * Keeps the records that satisfy every condition (AND) or at least one
 * (OR). A table without conditions is returned unchanged.
 */
export function filterTable<T extends SheetRecord>(
  records: T[],
  conditions: FilterCondition[],
  joinType: JoinType,
): T[] {
  if (conditions.length === 0) {
    return records;
  }
  return records.filter((record) =>
    joinType === "AND"
      ? conditions.every((condition) => evaluateCondition(record, condition))
      : conditions.some((condition) => evaluateCondition(record, condition)),
  );
}
