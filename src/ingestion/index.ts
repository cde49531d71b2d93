/**
 * Document sources: filesystem trees, fixed lists and cloned git repositories.
 *
 * @module ingestion
 */

export type { DocumentSource, FilterPatterns, CloneOptions, CloneResult, Cloner, RepositoryClonerConfig } from "./types.js";
export { PathFilter } from "./path-filter.js";
export { FileSystemSource } from "./file-system-source.js";
export type { FileSystemSourceOptions } from "./file-system-source.js";
export { StaticSource } from "./static-source.js";
export { GitRepositorySource } from "./git-repository-source.js";
export type { GitRepositorySourceOptions } from "./git-repository-source.js";
export { RepositoryCloner, classifyCloneError, sanitizeUrl, sanitizeErrorMessage } from "./repository-cloner.js";
export type { GitClient } from "./repository-cloner.js";
export {
  SourceError,
  ValidationError,
  PatternError,
  FileScanError,
  FileReadError,
  CloneError,
  NetworkError,
  AuthenticationError,
  RepositoryCloneError,
  isRetryableCloneError,
  errnoCode,
  asError,
} from "./errors.js";
