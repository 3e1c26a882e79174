import type { FieldListing, TableName } from "@plantdb/types";
import fieldCatalog from "./fieldCatalog.json";
import { normalizeFieldKey } from "../util/fieldValues";

export type FieldLookup =
  | { ok: true; field: string }
  | { ok: false; message: string };

export interface FieldCatalog {
  plants: { fields: string[]; aliases: Record<string, string> };
  locations: { fields: string[] };
  containers: { fields: string[] };
}

/**
 * Resolves user-facing field names to the canonical column names of each
 * table. Plant columns accept the alias map; location and container columns
 * accept any casing of their snake_case names.
 */
export class FieldRegistry {
  private readonly plantFieldsByKey = new Map<string, string>();
  private readonly plantAliasesByKey = new Map<string, string>();
  private readonly snakeFieldsByKey: Record<
    "locations" | "containers",
    Map<string, string>
  >;

  constructor(private readonly catalog: FieldCatalog) {
    for (const field of catalog.plants.fields) {
      this.plantFieldsByKey.set(field.toLowerCase(), field);
    }
    for (const [alias, field] of Object.entries(catalog.plants.aliases)) {
      this.plantAliasesByKey.set(alias.toLowerCase(), field);
    }
    this.snakeFieldsByKey = {
      locations: indexByNormalizedKey(catalog.locations.fields),
      containers: indexByNormalizedKey(catalog.containers.fields),
    };
  }

  canonicalize(table: TableName, fieldName: string): FieldLookup {
    if (table === "plants") {
      const field = this.canonicalPlantField(fieldName);
      return field
        ? { ok: true, field }
        : { ok: false, message: `Invalid field '${fieldName}' for plants table` };
    }

    const field = this.snakeFieldsByKey[table].get(normalizeFieldKey(fieldName));
    if (field) {
      return { ok: true, field };
    }
    return {
      ok: false,
      message: `Invalid field '${fieldName}' for ${table} table. Valid fields: ${this.catalog[table].fields.join(", ")}`,
    };
  }

  fieldsFor(table: TableName): string[] {
    return [...this.catalog[table].fields];
  }

  describe(): FieldListing {
    return {
      tables: {
        plants: this.fieldsFor("plants"),
        locations: this.fieldsFor("locations"),
        containers: this.fieldsFor("containers"),
      },
      aliases: { ...this.catalog.plants.aliases },
    };
  }

  private canonicalPlantField(fieldName: string): string | undefined {
    const key = fieldName.trim().toLowerCase();
    const direct =
      this.plantFieldsByKey.get(key) ?? this.plantAliasesByKey.get(key);
    if (direct) {
      return direct;
    }
    // plant_name / light-requirements style spellings
    const spaced = key.replace(/[_-]+/g, " ");
    return this.plantFieldsByKey.get(spaced) ?? this.plantAliasesByKey.get(spaced);
  }
}

function indexByNormalizedKey(fields: string[]): Map<string, string> {
  return new Map(fields.map((field) => [normalizeFieldKey(field), field]));
}

export function createFieldRegistry(
  catalog: FieldCatalog = fieldCatalog,
): FieldRegistry {
  return new FieldRegistry(catalog);
}

export const defaultFieldRegistry = createFieldRegistry();
