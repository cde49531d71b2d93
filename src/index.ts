/**
 * docstream - library entry point
 *
 * Streams documents from configured sources through a batching stage into a
 * full-text index.
 *
 * @example
 * ```typescript
 * import { FileSystemSource, IngestionService, PathFilter, SqliteSearchEngine } from "docstream";
 *
 * const engine = await SqliteSearchEngine.open({ path: "./index" });
 * const notes = new FileSystemSource({
 *   sourceId: "notes",
 *   paths: ["./notes"],
 *   filter: PathFilter.compile({ include: ["\\.md$"] }),
 * });
 * await new IngestionService(engine).ingest([notes]);
 * for await (const item of engine.search("computer")) console.log(item.title);
 * await engine.close();
 * ```
 *
 * @module docstream
 */

export * from "./documents/index.js";
export * from "./streams/index.js";
export * from "./ingestion/index.js";
export * from "./repositories/index.js";
export * from "./storage/index.js";
export * from "./services/index.js";
export * from "./config/index.js";
export * from "./utils/index.js";
export { initializeLogger, getComponentLogger, resetLogger, type LoggerConfig, type LogLevel, type LogFormat } from "./logging/index.js";
