/**
 * IngestionService - drives documents from sources into the search engine
 *
 * Sources are processed strictly one after another. Each source's documents
 * are grouped into batches and every batch is committed before the next one
 * is pulled. The first failure aborts the run.
 *
 * @module services/ingestion-service
 */

import type { Logger } from "pino";
import type { Document, FoundItem } from "../documents/index.js";
import type { DocumentSource } from "../ingestion/types.js";
import type { SearchEngine } from "../storage/types.js";
import { batched, InvalidBatchSizeError, type ChannelStream } from "../streams/index.js";
import { getComponentLogger } from "../logging/index.js";
import type {
  IngestionFailurePhase,
  IngestionProgress,
  IngestionServiceOptions,
  IngestionSummary,
  IngestOptions,
  SourceSummary,
} from "./ingestion-types.js";
import {
  DuplicateSourceError,
  IngestionCancelledError,
  IngestionInProgressError,
  SourceIngestionError,
  SourceMismatchError,
} from "./ingestion-errors.js";

const DEFAULT_BATCH_SIZE = 10;

function asError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

/**
 * Service for running ingestion over a list of sources
 *
 * @example
 * ```typescript
 * const service = new IngestionService(engine, { batchSize: 25 });
 * const summary = await service.ingest([notes, handbook], {
 *   onProgress: (p) => console.log(`${p.sourceId}: ${p.documents} documents`),
 * });
 * console.log(`Indexed ${summary.totalDocuments} documents`);
 * ```
 */
export class IngestionService {
  private _logger: Logger | null = null;

  /**
   * Guards against overlapping runs on one service
   */
  private _isIngesting = false;

  private readonly batchSize: number;

  /**
   * @throws {InvalidBatchSizeError} If `batchSize` is not a positive integer
   */
  constructor(
    private readonly engine: SearchEngine,
    options: IngestionServiceOptions = {}
  ) {
    const batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
    if (!Number.isInteger(batchSize) || batchSize < 1) {
      throw new InvalidBatchSizeError(batchSize);
    }
    this.batchSize = batchSize;
  }

  private get logger(): Logger {
    if (!this._logger) {
      this._logger = getComponentLogger("services:ingestion");
    }
    return this._logger;
  }

  get isIngesting(): boolean {
    return this._isIngesting;
  }

  /**
   * Fetch every source in order and index its documents
   *
   * @throws {SourceIngestionError} On the first fetch or index failure, naming the source
   * @throws {IngestionCancelledError} If `options.signal` aborts the run
   * @throws {IngestionInProgressError} If a run is already in progress
   * @throws {DuplicateSourceError} If two sources share an id
   */
  async ingest(sources: readonly DocumentSource[], options: IngestOptions = {}): Promise<IngestionSummary> {
    if (this._isIngesting) {
      throw new IngestionInProgressError();
    }
    const seen = new Set<string>();
    for (const source of sources) {
      if (seen.has(source.id)) {
        throw new DuplicateSourceError(source.id);
      }
      seen.add(source.id);
    }

    this._isIngesting = true;
    const startTime = performance.now();
    const summaries: SourceSummary[] = [];

    this.logger.info({ sources: sources.map((s) => s.id), batchSize: this.batchSize }, "Starting ingestion");

    try {
      for (const source of sources) {
        summaries.push(await this.ingestSource(source, options));
      }
    } catch (error) {
      this.logger.error({ err: error }, "Ingestion aborted");
      throw error;
    } finally {
      this._isIngesting = false;
    }

    const summary: IngestionSummary = {
      sources: summaries,
      totalDocuments: summaries.reduce((total, s) => total + s.documents, 0),
      durationMs: Math.round(performance.now() - startTime),
    };

    this.logger.info(
      {
        metric: "ingestion.run_duration_ms",
        value: summary.durationMs,
        sources: summaries.length,
        totalDocuments: summary.totalDocuments,
      },
      "Ingestion completed"
    );

    return summary;
  }

  private async ingestSource(source: DocumentSource, options: IngestOptions): Promise<SourceSummary> {
    const { signal } = options;
    const startTime = performance.now();
    let documents = 0;
    let batches = 0;

    const report = (phase: IngestionProgress["phase"]): void => {
      options.onProgress?.({ sourceId: source.id, phase, documents, batches });
    };

    if (signal?.aborted) {
      throw new IngestionCancelledError(source.id, 0);
    }

    this.logger.info({ sourceId: source.id }, "Ingesting source");
    report("fetching");

    let stream: ChannelStream<Document[]>;
    try {
      stream = batched(source.fetch(), this.batchSize, { name: `batched:${source.id}`, logger: this.logger });
    } catch (error) {
      throw new SourceIngestionError(source.id, "fetch", asError(error));
    }
    const onAbort = (): void => stream.cancel();
    signal?.addEventListener("abort", onAbort, { once: true });

    let phase: IngestionFailurePhase = "fetch";
    try {
      for await (const batch of stream) {
        this.assertOwnership(source.id, batch);

        phase = "index";
        await this.engine.index(batch);
        phase = "fetch";

        batches++;
        documents += batch.length;
        this.logger.debug({ sourceId: source.id, batch: batches, size: batch.length }, "Batch indexed");
        report("indexed");

        if (signal?.aborted) {
          break;
        }
      }
    } catch (error) {
      throw new SourceIngestionError(source.id, phase, asError(error));
    } finally {
      signal?.removeEventListener("abort", onAbort);
    }

    if (signal?.aborted) {
      throw new IngestionCancelledError(source.id, documents);
    }

    const durationMs = Math.round(performance.now() - startTime);
    this.logger.info(
      { metric: "ingestion.source_duration_ms", value: durationMs, sourceId: source.id, documents, batches },
      "Source ingested"
    );
    report("completed");

    return { sourceId: source.id, documents, batches, durationMs };
  }

  private assertOwnership(sourceId: string, batch: readonly Document[]): void {
    for (const document of batch) {
      if (document.source !== sourceId) {
        throw new SourceMismatchError(sourceId, document.id, document.source);
      }
    }
  }

  /**
   * Run a query and collect its results
   */
  async search(query: string): Promise<FoundItem[]> {
    const startTime = performance.now();
    const results = await this.engine.search(query).collect();
    this.logger.debug(
      { query, resultCount: results.length, durationMs: Math.round(performance.now() - startTime) },
      "Search collected"
    );
    return results;
  }
}
