/**
 * Services module - ingestion driver
 *
 * @module services
 */

export { IngestionService } from "./ingestion-service.js";

export type {
  IngestionServiceOptions,
  IngestOptions,
  IngestionProgress,
  IngestionProgressPhase,
  IngestionFailurePhase,
  IngestionSummary,
  SourceSummary,
} from "./ingestion-types.js";

export {
  IngestionError,
  SourceIngestionError,
  SourceMismatchError,
  DuplicateSourceError,
  IngestionInProgressError,
  IngestionCancelledError,
} from "./ingestion-errors.js";
