import type { SortSpec } from "../../types/querySchema";
import type { JoinedResult } from "../../types/records";
import {
  getFieldValue,
  isMissing,
  toFloat,
  toText,
} from "../../util/fieldValues";

/**
 * `natural` compares keys that both look numeric as numbers (so "2" < "10");
 * `lexicographic` compares every key as a lowercase string.
 */
export const SORT_MODES = ["natural", "lexicographic"] as const;

export type SortMode = (typeof SORT_MODES)[number];

/**
 * The sort key of a result: the field on the plant, else on its location,
 * else on its first container, lowercased. Unknown fields give "".
 */
export function getSortKey(result: JoinedResult, field: string): string {
  let value = getFieldValue(result.plant_data, field);
  if (isMissing(value) && result.location_data) {
    value = getFieldValue(result.location_data, field);
  }
  const [firstContainer] = result.containers;
  if (isMissing(value) && firstContainer) {
    value = getFieldValue(firstContainer, field);
  }
  return toText(value).toLowerCase();
}

function compareText(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

function finiteOrNull(value: number | null): number | null {
  return value !== null && Number.isFinite(value) ? value : null;
}

export function compareSortKeys(a: string, b: string, mode: SortMode): number {
  if (mode === "lexicographic") {
    return compareText(a, b);
  }
  const numberA = finiteOrNull(toFloat(a));
  const numberB = finiteOrNull(toFloat(b));
  if (numberA !== null && numberB !== null) {
    return numberA - numberB;
  }
  // Numeric keys come before text keys
  if (numberA !== null) return -1;
  if (numberB !== null) return 1;
  return compareText(a, b);
}

/**
 * Multi-key stable sort. Keys are applied from last to first so the first
 * key in the list ends up dominant; `desc` flips a key's order while ties
 * keep their previous relative order.
 */
export function applySorting(
  results: JoinedResult[],
  sort: SortSpec[],
  mode: SortMode = "natural",
): JoinedResult[] {
  let sorted = [...results];
  for (const { field, direction } of [...sort].reverse()) {
    const sign = direction === "desc" ? -1 : 1;
    const keyed = sorted.map((result) => ({
      result,
      key: getSortKey(result, field),
    }));
    keyed.sort((a, b) => sign * compareSortKeys(a.key, b.key, mode));
    sorted = keyed.map(({ result }) => result);
  }
  return sorted;
}

export function applyLimit<T>(results: T[], limit: number): T[] {
  return results.slice(0, limit);
}
