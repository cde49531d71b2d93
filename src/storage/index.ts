/**
 * Search engine module
 *
 * Full-text index facade and its SQLite FTS5 implementation.
 *
 * @module storage
 *
 * @example
 * ```typescript
 * import { SqliteSearchEngine, QueryParseError } from './storage';
 *
 * const engine = await SqliteSearchEngine.open({ path: "./index" });
 * const results = await engine.search("hello").collect();
 * ```
 */

export { SqliteSearchEngine } from "./sqlite-search-engine.js";

export { TOP_K, DATABASE_FILE } from "./types.js";
export type { SearchEngine, SqliteSearchEngineOptions, ReaderRefreshPolicy } from "./types.js";

export {
  StorageError,
  StorageOpenError,
  EngineClosedError,
  InvalidDocumentError,
  IndexWriteError,
  QueryParseError,
  SearchOperationError,
  isRetryableStorageError,
} from "./errors.js";
