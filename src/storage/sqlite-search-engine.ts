/**
 * SQLite FTS5 search engine
 *
 * Documents live in a regular table keyed by `(source, id)`; an external-content
 * FTS5 table over title and content is kept in sync by triggers. One writer
 * connection is guarded by a FIFO lock so batches commit in call order, and a
 * separate read-only connection serves searches concurrently through WAL.
 *
 * @module storage/sqlite-search-engine
 */

import { mkdir } from "node:fs/promises";
import { join } from "node:path";
import Database from "better-sqlite3";
import type { Logger } from "pino";

import type { Document, FoundItem } from "../documents/index.js";
import { getComponentLogger } from "../logging/index.js";
import { channelStream, type ChannelStream } from "../streams/index.js";
import { Mutex } from "../utils/mutex.js";
import {
  EngineClosedError,
  IndexWriteError,
  InvalidDocumentError,
  QueryParseError,
  SearchOperationError,
  StorageError,
  StorageOpenError,
  isRetryableStorageError,
} from "./errors.js";
import {
  DELETE_ALL_SQL,
  DELETE_SOURCE_SQL,
  FTS_OPTIMIZE_SQL,
  SEARCH_SQL,
  UPSERT_DOCUMENT_SQL,
  getSchemaSQL,
} from "./schema.js";
import {
  DATABASE_FILE,
  TOP_K,
  type ReaderRefreshPolicy,
  type SearchEngine,
  type SqliteSearchEngineOptions,
} from "./types.js";

const DEFAULT_WRITE_CHUNK_SIZE = 100;

interface SearchRow {
  id: string;
  source: string;
  title: string;
  link: string;
  snippet: string;
  score: number;
}

interface UpsertParams {
  source: string;
  id: string;
  title: string;
  link: string;
  content: string;
  metadata: string;
  indexedAt: string;
}

function asError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

function yieldToEventLoop(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

function validateBatch(batch: readonly Document[]): void {
  batch.forEach((document, position) => {
    if (document.id.trim().length === 0) {
      throw new InvalidDocumentError(`Document at position ${position} has an empty id`, "id");
    }
    if (document.source.trim().length === 0) {
      throw new InvalidDocumentError(`Document '${document.id}' has an empty source`, "source");
    }
  });
}

/**
 * Full-text index on SQLite FTS5.
 *
 * @example
 * ```typescript
 * const engine = await SqliteSearchEngine.open({ path: "/var/lib/docstream" });
 * await engine.index(documents);
 * for await (const item of engine.search("computer")) {
 *   console.log(item.score, item.title, item.snippet);
 * }
 * await engine.close();
 * ```
 */
export class SqliteSearchEngine implements SearchEngine {
  private readonly writeLock = new Mutex();
  private readonly upsertStatement: Database.Statement<[UpsertParams], unknown>;
  private readonly searchStatement: Database.Statement<[string, number], SearchRow>;
  private closing?: Promise<void>;
  private _logger: Logger | null;

  private constructor(
    private readonly writer: Database.Database,
    private readonly reader: Database.Database,
    private readonly readerRefresh: ReaderRefreshPolicy,
    private readonly writeChunkSize: number,
    logger?: Logger
  ) {
    this._logger = logger ?? null;
    this.upsertStatement = writer.prepare<UpsertParams>(UPSERT_DOCUMENT_SQL);
    this.searchStatement = reader.prepare<[string, number], SearchRow>(SEARCH_SQL);
    if (readerRefresh === "manual") {
      this.pinSnapshot();
    }
  }

  private get logger(): Logger {
    if (!this._logger) {
      this._logger = getComponentLogger("storage:sqlite");
    }
    return this._logger;
  }

  /**
   * Open (or create) the index in `options.path`
   *
   * @throws {StorageOpenError} If the directory or database cannot be created
   */
  static async open(options: SqliteSearchEngineOptions, logger?: Logger): Promise<SqliteSearchEngine> {
    const writeChunkSize = options.writeChunkSize ?? DEFAULT_WRITE_CHUNK_SIZE;
    if (!Number.isInteger(writeChunkSize) || writeChunkSize < 1) {
      throw new StorageError(`writeChunkSize must be a positive integer, got ${writeChunkSize}`, "INVALID_PARAMETERS");
    }

    const dbPath = join(options.path, DATABASE_FILE);
    let writer: Database.Database | undefined;
    let reader: Database.Database | undefined;
    try {
      await mkdir(options.path, { recursive: true });

      writer = new Database(dbPath);
      writer.pragma("journal_mode = WAL");
      writer.pragma("synchronous = NORMAL");
      writer.exec(getSchemaSQL());

      reader = new Database(dbPath, { readonly: true, fileMustExist: true });

      const engine = new SqliteSearchEngine(
        writer,
        reader,
        options.readerRefresh ?? "on-commit",
        writeChunkSize,
        logger
      );
      engine.logger.info(
        { path: dbPath, readerRefresh: engine.readerRefresh, writeChunkSize },
        "Search index opened"
      );
      return engine;
    } catch (error) {
      reader?.close();
      writer?.close();
      throw new StorageOpenError(dbPath, asError(error));
    }
  }

  async index(batch: readonly Document[]): Promise<void> {
    if (this.closing) {
      throw new EngineClosedError("index");
    }
    validateBatch(batch);
    if (batch.length === 0) {
      return;
    }

    const release = await this.writeLock.acquire();
    const startTime = performance.now();
    try {
      this.writer.exec("BEGIN IMMEDIATE");
      const indexedAt = new Date().toISOString();

      for (let offset = 0; offset < batch.length; offset += this.writeChunkSize) {
        if (offset > 0) {
          // Let searches and other I/O run between chunks
          await yieldToEventLoop();
        }
        for (const document of batch.slice(offset, offset + this.writeChunkSize)) {
          this.upsertStatement.run({
            source: document.source,
            id: document.id,
            title: document.title,
            link: document.link,
            content: document.content,
            metadata: JSON.stringify(document.metadata),
            indexedAt,
          });
        }
      }

      this.writer.exec("COMMIT");

      this.logger.info(
        {
          metric: "index.batch_duration_ms",
          value: Math.round(performance.now() - startTime),
          documents: batch.length,
        },
        "Batch committed"
      );
    } catch (error) {
      if (this.writer.inTransaction) {
        this.writer.exec("ROLLBACK");
      }
      const cause = asError(error);
      throw new IndexWriteError(
        `Failed to index batch of ${batch.length} documents: ${cause.message}`,
        batch.length,
        cause,
        isRetryableStorageError(error)
      );
    } finally {
      release();
    }
  }

  search(query: string): ChannelStream<FoundItem> {
    return channelStream<FoundItem>(
      async (tx) => {
        if (!this.reader.open) {
          throw new EngineClosedError("search");
        }
        const trimmed = query.trim();
        if (trimmed.length === 0) {
          throw new QueryParseError(query, "Search query cannot be empty");
        }

        const startTime = performance.now();
        const rows = this.runQuery(trimmed);
        this.logger.info(
          {
            metric: "search.query_duration_ms",
            value: Math.round(performance.now() - startTime),
            resultCount: rows.length,
          },
          "Search completed"
        );

        for (const row of rows) {
          await tx.send({
            id: row.id,
            score: row.score,
            source: row.source,
            title: row.title,
            link: row.link,
            snippet: row.snippet,
          });
        }
      },
      { name: "search", logger: this.logger }
    );
  }

  private runQuery(query: string): SearchRow[] {
    try {
      return this.searchStatement.all(query, TOP_K);
    } catch (error) {
      // FTS5 reports malformed queries and unknown column filters as SQLITE_ERROR
      if (error instanceof Database.SqliteError && error.code === "SQLITE_ERROR") {
        throw new QueryParseError(query, `Invalid search query '${query}': ${error.message}`, error);
      }
      const cause = asError(error);
      throw new SearchOperationError(`Search failed: ${cause.message}`, cause, isRetryableStorageError(error));
    }
  }

  async reload(): Promise<void> {
    if (!this.reader.open) {
      throw new EngineClosedError("reload");
    }
    if (this.readerRefresh === "manual") {
      this.reader.exec("COMMIT");
      this.pinSnapshot();
      this.logger.debug("Reader moved to latest commit");
    }
  }

  /**
   * Open a read transaction so the reader keeps seeing the current commit
   */
  private pinSnapshot(): void {
    this.reader.exec("BEGIN");
    this.reader.prepare("SELECT count(*) FROM documents").pluck().get();
  }

  async purge(source?: string): Promise<number> {
    if (this.closing) {
      throw new EngineClosedError("purge");
    }

    return this.writeLock.runExclusive(() => {
      try {
        const result =
          source === undefined
            ? this.writer.prepare<[]>(DELETE_ALL_SQL).run()
            : this.writer.prepare<[string]>(DELETE_SOURCE_SQL).run(source);
        this.logger.info({ source: source ?? "*", removed: result.changes }, "Documents purged");
        return result.changes;
      } catch (error) {
        const cause = asError(error);
        throw new IndexWriteError(`Failed to purge documents: ${cause.message}`, 0, cause);
      }
    });
  }

  close(): Promise<void> {
    if (!this.closing) {
      this.closing = this.writeLock.runExclusive(() => {
        if (this.reader.inTransaction) {
          this.reader.exec("COMMIT");
        }
        this.reader.close();
        try {
          this.writer.exec(FTS_OPTIMIZE_SQL);
        } catch (error) {
          this.logger.warn({ err: error }, "FTS optimize failed before close");
        }
        this.writer.close();
        this.logger.info("Search index closed");
      });
    }
    return this.closing;
  }
}
