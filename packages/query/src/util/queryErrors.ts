import type {
  QueryExecutionErrorDetails,
  QueryParseErrorDetails,
} from "@plantdb/types";

export class QueryParseError extends Error {
  details: QueryParseErrorDetails;

  constructor(details: QueryParseErrorDetails, cause?: unknown) {
    super(details.message, { cause });
    this.name = "QueryParseError";
    this.details = details;
  }
}

export class QueryExecutionError extends Error {
  details: QueryExecutionErrorDetails;

  constructor(details: QueryExecutionErrorDetails, cause?: unknown) {
    super(details.message, { cause });
    this.name = "QueryExecutionError";
    this.details = details;
  }
}
