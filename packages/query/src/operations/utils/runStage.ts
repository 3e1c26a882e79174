import type {
  ExecutionStage,
  QueryExecutionErrorDetails,
} from "@plantdb/types";
import { logger } from "../../util/logger";
import { QueryExecutionError } from "../../util/queryErrors";

/**
 * Runs one step of the query pipeline. Failures are logged with the stage
 * name and rethrown as QueryExecutionError carrying the original error.
 */
export async function runStage<T>(
  stage: ExecutionStage,
  step: () => T | Promise<T>,
): Promise<T> {
  try {
    return await step();
  } catch (error) {
    if (error instanceof QueryExecutionError) {
      throw error;
    }
    logger.error({ stage, error }, "Query stage failed");
    const message = error instanceof Error ? error.message : String(error);
    const details: QueryExecutionErrorDetails = {
      type: "query_execution",
      message: `Query execution failed: ${message}`,
      stage,
    };
    throw new QueryExecutionError(details, error);
  }
}
