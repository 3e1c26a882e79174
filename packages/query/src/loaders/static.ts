import type { TableSnapshot } from "../types/records";
import { normalizeLocationRecord } from "./normalize";
import type { RecordLoader } from "./types";

/** Serves a fixed snapshot held in memory. */
export class StaticRecordLoader implements RecordLoader {
  private readonly snapshot: TableSnapshot;

  constructor(snapshot: Partial<TableSnapshot> = {}) {
    this.snapshot = {
      plants: snapshot.plants ?? [],
      locations: (snapshot.locations ?? []).map(normalizeLocationRecord),
      containers: snapshot.containers ?? [],
    };
  }

  async loadPlants() {
    return this.snapshot.plants;
  }

  async loadLocations() {
    return this.snapshot.locations;
  }

  async loadContainers() {
    return this.snapshot.containers;
  }
}
