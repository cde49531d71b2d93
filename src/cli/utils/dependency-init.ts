/**
 * Dependency Initialization for CLI
 *
 * Loads the environment and configuration file, initializes logging and opens
 * the search index for a single command run.
 */

import type { Logger } from "pino";
import {
  ConfigError,
  buildSearchEngine,
  buildSources,
  loadConfig,
  loadEnvironment,
  selectSources,
  type DocstreamConfig,
  type Environment,
} from "../../config/index.js";
import type { DocumentSource } from "../../ingestion/types.js";
import { getComponentLogger, initializeLogger, isLoggerInitialized } from "../../logging/index.js";
import { IngestionService } from "../../services/ingestion-service.js";
import type { SearchEngine } from "../../storage/types.js";

/**
 * All dependencies required by CLI commands
 */
export interface CliDependencies {
  config: DocstreamConfig;
  environment: Environment;
  engine: SearchEngine;
  ingestionService: IngestionService;

  /** Build the configured sources, narrowed to `ids` when any are given */
  sources(ids: readonly string[]): Promise<DocumentSource[]>;

  logger: Logger;
}

export interface InitializeOptions {
  /** Falls back to DOCSTREAM_CONFIG */
  configPath?: string;
}

/**
 * Initialize all dependencies for CLI commands
 *
 * @throws {ConfigError} If no configuration file is given or it is invalid
 * @throws {StorageOpenError} If the index cannot be opened
 */
export async function initializeDependencies(
  options: InitializeOptions = {},
  env: NodeJS.ProcessEnv = process.env
): Promise<CliDependencies> {
  const environment = loadEnvironment(env);

  // CLI logs go to stderr so stdout stays clean for results
  if (!isLoggerInitialized()) {
    initializeLogger({ level: environment.logLevel, format: environment.logFormat });
  }
  const logger = getComponentLogger("cli");

  const configPath = options.configPath ?? environment.configPath;
  if (configPath === undefined) {
    throw new ConfigError("No configuration file given. Pass --config <path> or set DOCSTREAM_CONFIG.");
  }

  const config = await loadConfig(configPath);
  logger.debug(
    { configPath, sources: config.sources.map((s) => s.id), engine: config.engine },
    "Configuration loaded"
  );

  const engine = await buildSearchEngine(config);
  const ingestionService = new IngestionService(engine, { batchSize: config.batchSize });

  return {
    config,
    environment,
    engine,
    ingestionService,
    sources: (ids) => buildSources(selectSources(config, ids), { environment }),
    logger,
  };
}

/**
 * Run `fn` with freshly initialized dependencies, closing the index afterwards
 */
export async function withDependencies(
  options: InitializeOptions,
  fn: (deps: CliDependencies) => Promise<void>
): Promise<void> {
  const deps = await initializeDependencies(options);
  try {
    await fn(deps);
  } finally {
    await deps.engine.close();
  }
}
