export type TableName = "plants" | "locations" | "containers";

export type IncludeSection = TableName | "context";

export type ResponseFormat = "summary" | "detailed" | "minimal" | "ids_only";

export type JoinType = "AND" | "OR";

export type SortDirection = "asc" | "desc";

export type CellValue = string | number | boolean | null;

export type SheetRecord = { [column: string]: CellValue | undefined };

export type QueryParseErrorDetails = {
  type: "query_parse";
  message: string;
  path: (string | number)[];
};

export type ExecutionStage = "load" | "filter" | "join" | "sort" | "format";

export type QueryExecutionErrorDetails = {
  type: "query_execution";
  message: string;
  stage?: ExecutionStage;
};

export type QueryMetadata = {
  total_matches: number;
  applied_limit: number;
  response_format: ResponseFormat;
  tables_queried: TableName[];
  execution_success: true;
};

export type IdsOnlyResponse = {
  plant_ids: string[];
  total_matches: number;
};

export type MinimalPlant = {
  plant_id: string;
  plant_name: string;
  location: string | null;
};

export type MinimalResponse = {
  plants: MinimalPlant[];
  total_matches: number;
};

export type ContainerSummary = {
  type: CellValue | null;
  size: CellValue | null;
  material: CellValue | null;
};

export type SamplePlant = MinimalPlant & {
  containers: ContainerSummary[];
};

export type SummaryResponse = {
  total_matches: number;
  summary: {
    by_plant_type: Record<string, number>;
    by_container: Record<string, number>;
    by_location: Record<string, number>;
  };
  sample_plants: SamplePlant[];
  response_format: "summary";
};

export type PlantLocationContext = {
  container: SheetRecord;
  location: SheetRecord;
  context: {
    placement_description: string;
    sun_exposure_summary: string;
    care_complexity: "low" | "medium" | "high";
    priority_considerations: string[];
  };
};

export type DetailedPlant = {
  plant_id: string;
  plant_data?: SheetRecord;
  location_data?: SheetRecord | null;
  containers?: SheetRecord[];
  context?: PlantLocationContext[] | null;
};

export type DetailedResponse = {
  plants: DetailedPlant[];
  total_matches: number;
  response_format: "detailed";
};

export type FormattedResponse =
  | IdsOnlyResponse
  | MinimalResponse
  | SummaryResponse
  | DetailedResponse;

export type QueryResponse = FormattedResponse & {
  query_metadata: QueryMetadata;
};

export type FieldListing = {
  tables: Record<TableName, string[]>;
  aliases: Record<string, string>;
};
