import type { PlantLocationContext } from "@plantdb/types";
import type { RecordLoader } from "../loaders/types";
import type { SortMode } from "./sort";

export interface PlantContextResolver {
  resolvePlantContext(plantId: string): Promise<PlantLocationContext[]>;
}

/**
 * Collaborators an advanced query runs against. Built once at startup and
 * shared by every request.
 */
export interface ExecutionContext {
  loader: RecordLoader;
  /** Used when a detailed query includes `context`. */
  contextResolver?: PlantContextResolver;
  sortMode?: SortMode;
}
