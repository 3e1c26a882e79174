import { z } from "zod";
import { SORT_MODES } from "./operations/sort";

const baseSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  PORT: z.coerce.number().int().positive().default(5000),
  API_KEY: z.string().optional(),
  CACHE_TTL_SECONDS: z.coerce.number().min(0).default(60),
  SORT_MODE: z.enum(SORT_MODES).default("natural"),
});

const sheetsSchema = baseSchema.extend({
  DATA_SOURCE: z.literal("sheets"),
  GOOGLE_SHEETS_SPREADSHEET_ID: z.string(),
  GOOGLE_SHEETS_API_KEY: z.string(),
  PLANTS_RANGE: z.string().optional(),
  LOCATIONS_RANGE: z.string().optional(),
  CONTAINERS_RANGE: z.string().optional(),
});

const jsonSchema = baseSchema.extend({
  DATA_SOURCE: z.literal("json"),
  PLANT_DATA_DIR: z.string(),
});

export const envSchema = z.discriminatedUnion("DATA_SOURCE", [
  sheetsSchema,
  jsonSchema,
]);

export type ServiceConfig = z.infer<typeof envSchema>;

/** Empty variables count as unset, so `API_KEY=` leaves auth disabled. */
export function parseEnv(
  source: Record<string, string | undefined>,
): ServiceConfig {
  const defined = Object.fromEntries(
    Object.entries(source).filter(([, value]) => value !== undefined && value !== ""),
  );
  return envSchema.parse(defined);
}
