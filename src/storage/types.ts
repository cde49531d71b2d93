/**
 * Type definitions for the search engine facade
 *
 * @module storage/types
 */

import type { Document, FoundItem } from "../documents/index.js";
import type { ChannelStream } from "../streams/index.js";

/**
 * When readers observe committed writes.
 *
 * - `on-commit`: every search sees the latest commit
 * - `manual`: searches see a fixed snapshot until {@link SearchEngine.reload} is called
 */
export type ReaderRefreshPolicy = "on-commit" | "manual";

/**
 * Full-text index with serialized writes and concurrent reads
 */
export interface SearchEngine {
  /**
   * Upsert every document of the batch by `(source, id)`, then commit.
   *
   * Calls are serialized and commit in invocation order.
   */
  index(batch: readonly Document[]): Promise<void>;

  /**
   * Ranked retrieval over title and content, at most {@link TOP_K} results.
   *
   * Query and engine failures end the stream with a terminal error.
   */
  search(query: string): ChannelStream<FoundItem>;

  /**
   * Move the reader to the latest commit. No-op under `on-commit`.
   */
  reload(): Promise<void>;

  /**
   * Delete every document, or those of one source. Resolves with the number removed.
   */
  purge(source?: string): Promise<number>;

  /**
   * Wait for the in-flight write, then release the index
   */
  close(): Promise<void>;
}

/**
 * Options for {@link SqliteSearchEngine.open}
 */
export interface SqliteSearchEngineOptions {
  /** Index directory; created if missing */
  path: string;

  /** @default "on-commit" */
  readerRefresh?: ReaderRefreshPolicy;

  /**
   * Documents written between yields to the event loop
   * @default 100
   */
  writeChunkSize?: number;
}

/**
 * Maximum number of results a search returns
 */
export const TOP_K = 10;

/**
 * File name of the database inside the index directory
 */
export const DATABASE_FILE = "documents.sqlite";
