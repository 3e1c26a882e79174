import type {
  ContainerRecord,
  LocationRecord,
  PlantRecord,
} from "../types/records";

/**
 * Source of the three sheets. Every call returns the current rows; callers
 * never mutate the returned arrays or records.
 */
export interface RecordLoader {
  loadPlants(): Promise<PlantRecord[]>;
  loadLocations(): Promise<LocationRecord[]>;
  loadContainers(): Promise<ContainerRecord[]>;
}
