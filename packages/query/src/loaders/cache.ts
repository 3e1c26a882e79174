import type {
  ContainerRecord,
  LocationRecord,
  PlantRecord,
} from "../types/records";
import type { RecordLoader } from "./types";

type CacheEntry<T> = {
  value?: T;
  loadedAt: number;
  pending: Promise<T> | null;
};

function emptyEntry<T>(): CacheEntry<T> {
  return { loadedAt: 0, pending: null };
}

/**
 * Wraps a loader with a per-table TTL cache. Concurrent callers that miss
 * the cache wait on the same in-flight load. A TTL of 0 disables caching.
 */
export class CachedRecordLoader implements RecordLoader {
  private plants = emptyEntry<PlantRecord[]>();
  private locations = emptyEntry<LocationRecord[]>();
  private containers = emptyEntry<ContainerRecord[]>();

  constructor(
    private readonly inner: RecordLoader,
    private readonly ttlMs: number,
    private readonly now: () => number = Date.now,
  ) {}

  private async cached<T>(
    entry: CacheEntry<T>,
    load: () => Promise<T>,
  ): Promise<T> {
    if (this.ttlMs <= 0) {
      return load();
    }

    if (entry.value && this.now() - entry.loadedAt < this.ttlMs) {
      return entry.value;
    }

    // Already loading: wait for the same promise
    if (entry.pending) {
      return entry.pending;
    }

    entry.pending = load();
    try {
      entry.value = await entry.pending;
      entry.loadedAt = this.now();
      return entry.value;
    } finally {
      entry.pending = null;
    }
  }

  loadPlants() {
    return this.cached(this.plants, () => this.inner.loadPlants());
  }

  loadLocations() {
    return this.cached(this.locations, () => this.inner.loadLocations());
  }

  loadContainers() {
    return this.cached(this.containers, () => this.inner.loadContainers());
  }

  /** Drops every cached table, forcing a reload on next access. */
  clear(): void {
    this.plants = emptyEntry();
    this.locations = emptyEntry();
    this.containers = emptyEntry();
  }
}
