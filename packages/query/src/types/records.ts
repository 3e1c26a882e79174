import type { CellValue, SheetRecord } from "@plantdb/types";

export type { CellValue, SheetRecord };

/**
 * A row of the Plants sheet. Headers are kept exactly as written in the sheet,
 * so the known columns use their display names.
 */
export type PlantRecord = SheetRecord & {
  ID?: CellValue;
  id?: CellValue;
  plant_id?: CellValue;
  "Plant Name"?: CellValue;
  plant_name?: CellValue;
  Location?: CellValue;
};

export type LocationRecord = SheetRecord & {
  location_id?: CellValue;
  location_name?: CellValue;
  morning_sun_hours?: CellValue;
  afternoon_sun_hours?: CellValue;
  evening_sun_hours?: CellValue;
  total_sun_hours?: CellValue;
  shade_pattern?: CellValue;
  microclimate_conditions?: CellValue;
};

export type ContainerRecord = SheetRecord & {
  container_id?: CellValue;
  plant_id?: CellValue;
  location_id?: CellValue;
  location_name?: CellValue;
  container_type?: CellValue;
  container_size?: CellValue;
  container_material?: CellValue;
};

export interface TableSnapshot {
  plants: PlantRecord[];
  locations: LocationRecord[];
  containers: ContainerRecord[];
}


export interface JoinedResult {
  plant_id: string;
  plant_data: PlantRecord;
  containers: ContainerRecord[];
  location_data: LocationRecord | null;
}
