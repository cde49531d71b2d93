/**
 * Type definitions for the IngestionService
 *
 * @module services/ingestion-types
 */

/**
 * Options for constructing an IngestionService
 */
export interface IngestionServiceOptions {
  /**
   * Documents handed to the engine per `index` call
   * @default 10
   */
  batchSize?: number;
}

/**
 * Where an ingestion run was when a source failed
 *
 * - `fetch`: producing documents (walk, clone, listing) or validating them
 * - `index`: writing a batch to the engine
 */
export type IngestionFailurePhase = "fetch" | "index";

/**
 * Progress events, per source
 */
export type IngestionProgressPhase =
  | "fetching" // Source started
  | "indexed" // A batch was committed
  | "completed"; // Source drained

export interface IngestionProgress {
  sourceId: string;
  phase: IngestionProgressPhase;

  /** Documents committed so far for this source */
  documents: number;

  /** Batches committed so far for this source */
  batches: number;
}

/**
 * Options for a single ingestion run
 */
export interface IngestOptions {
  /**
   * Invoked synchronously at each progress step
   */
  onProgress?: (progress: IngestionProgress) => void;

  /**
   * Stops the run after the batch in flight is committed
   */
  signal?: AbortSignal;
}

/**
 * Outcome of one source
 */
export interface SourceSummary {
  sourceId: string;
  documents: number;
  batches: number;
  durationMs: number;
}

/**
 * Outcome of a successful run
 */
export interface IngestionSummary {
  /** One entry per source, in processing order */
  sources: SourceSummary[];
  totalDocuments: number;
  durationMs: number;
}
