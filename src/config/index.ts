/**
 * Configuration Module Exports
 *
 * @module config
 */

export {
  DocstreamConfigSchema,
  SourceConfigSchema,
  EngineConfigSchema,
  defaultIndexPath,
  type DocstreamConfig,
  type SourceConfig,
  type FileSystemSourceConfig,
  type GitHubSourceConfig,
  type StaticSourceConfig,
  type EngineConfig,
} from "./schema.js";
export { ConfigError } from "./errors.js";
export { loadEnvironment, type Environment } from "./environment.js";
export { loadConfig, parseConfig, expandHome } from "./loader.js";
export { buildSources, buildSearchEngine, selectSources, type SourceDependencies } from "./factory.js";
