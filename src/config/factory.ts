/**
 * Turn a validated configuration into runtime objects
 *
 * Patterns are compiled and token files read here, so a bad configuration
 * fails before any source starts fetching.
 *
 * @module config/factory
 */

import { readFile } from "node:fs/promises";
import type { Logger } from "pino";
import type { Document } from "../documents/types.js";
import {
  FileSystemSource,
  GitRepositorySource,
  PathFilter,
  PatternError,
  RepositoryCloner,
  StaticSource,
  type DocumentSource,
  type GitClient,
} from "../ingestion/index.js";
import {
  GitHubApiLister,
  GitHubValidationError,
  StaticListLister,
  type FetchFn,
  type GitHubListTarget,
  type RepositoryLister,
} from "../repositories/index.js";
import { SqliteSearchEngine } from "../storage/index.js";
import type { Environment } from "./environment.js";
import { ConfigError } from "./errors.js";
import type { DocstreamConfig, FileSystemSourceConfig, GitHubSourceConfig, StaticSourceConfig } from "./schema.js";

/**
 * Collaborators the built sources use; tests substitute in-process fakes
 */
export interface SourceDependencies {
  environment?: Pick<Environment, "githubToken">;
  git?: GitClient;
  fetch?: FetchFn;

  /** Parent directory for clone temp directories */
  tempRoot?: string;
}

function compileFilter(sourceId: string, patterns: { include: string[]; exclude: string[] }): PathFilter {
  try {
    return PathFilter.compile(patterns);
  } catch (error) {
    if (error instanceof PatternError) {
      throw new ConfigError(`Source '${sourceId}': ${error.message}`, { cause: error });
    }
    throw error;
  }
}

async function readTokenFile(sourceId: string, path: string): Promise<string> {
  try {
    const token = (await readFile(path, "utf8")).trim();
    if (token.length === 0) {
      throw new ConfigError(`Source '${sourceId}': token file ${path} is empty`);
    }
    return token;
  } catch (error) {
    if (error instanceof ConfigError) {
      throw error;
    }
    const cause = error instanceof Error ? error : undefined;
    throw new ConfigError(`Source '${sourceId}': cannot read token file ${path}`, { cause });
  }
}

function buildFileSystemSource(config: FileSystemSourceConfig): DocumentSource {
  return new FileSystemSource({
    sourceId: config.id,
    paths: config.paths,
    filter: compileFilter(config.id, config),
  });
}

function buildStaticSource(config: StaticSourceConfig): DocumentSource {
  const documents: Document[] = config.documents.map((doc) => ({ ...doc, source: config.id }));
  return new StaticSource(config.id, documents);
}

async function buildGitHubSource(config: GitHubSourceConfig, deps: SourceDependencies): Promise<DocumentSource> {
  const filter = compileFilter(config.id, config);
  const repositories = config.repositories;

  let token = deps.environment?.githubToken;
  let lister: RepositoryLister;
  if (repositories.from === "list") {
    lister = StaticListLister.fromReferences(repositories.list, {
      server: repositories.server,
      transport: repositories.transport,
    });
  } else {
    if (repositories.tokenFile !== undefined) {
      token = await readTokenFile(config.id, repositories.tokenFile);
    }
    const targets: GitHubListTarget[] = repositories.starredBy.map((login) => ({ kind: "starred", login }));
    if (repositories.search !== undefined) {
      targets.push({ kind: "search", query: repositories.search });
    }
    try {
      lister = new GitHubApiLister(
        {
          targets,
          token,
          endpoint: repositories.endpoint,
          pageSize: repositories.pageSize,
          transport: repositories.transport,
        },
        { fetch: deps.fetch }
      );
    } catch (error) {
      if (error instanceof GitHubValidationError) {
        throw new ConfigError(`Source '${config.id}': ${error.message}`, {
          issues: error.validationErrors,
          cause: error,
        });
      }
      throw error;
    }
  }

  return new GitRepositorySource({
    sourceId: config.id,
    lister,
    cloner: new RepositoryCloner({ githubToken: token }, deps.git),
    filter,
    tempRoot: deps.tempRoot,
  });
}

/**
 * Build one document source per configured source, in configuration order
 *
 * @throws {ConfigError} On an invalid pattern, GitHub target or an unreadable token file
 */
export async function buildSources(config: DocstreamConfig, deps: SourceDependencies = {}): Promise<DocumentSource[]> {
  const sources: DocumentSource[] = [];
  for (const source of config.sources) {
    switch (source.source) {
      case "fs":
        sources.push(buildFileSystemSource(source));
        break;
      case "static":
        sources.push(buildStaticSource(source));
        break;
      case "github":
        sources.push(await buildGitHubSource(source, deps));
        break;
    }
  }
  return sources;
}

/**
 * Narrow a configuration to the named sources, keeping configuration order
 *
 * An empty list keeps every source.
 *
 * @throws {ConfigError} If a name matches no configured source
 */
export function selectSources(config: DocstreamConfig, ids: readonly string[]): DocstreamConfig {
  if (ids.length === 0) {
    return config;
  }
  const known = config.sources.map((source) => source.id);
  const unknown = ids.filter((id) => !known.includes(id));
  if (unknown.length > 0) {
    throw new ConfigError(
      `Unknown source${unknown.length > 1 ? "s" : ""} ${unknown.map((id) => `'${id}'`).join(", ")}. Configured sources: ${known.join(", ")}`
    );
  }
  return { ...config, sources: config.sources.filter((source) => ids.includes(source.id)) };
}

/**
 * Open the configured index
 */
export function buildSearchEngine(config: DocstreamConfig, logger?: Logger): Promise<SqliteSearchEngine> {
  return SqliteSearchEngine.open({ path: config.engine.path, readerRefresh: config.engine.readerRefresh }, logger);
}
