/**
 * Configuration file loading
 *
 * @module config/loader
 */

import { readFile } from "node:fs/promises";
import { homedir } from "node:os";
import { dirname, isAbsolute, join, resolve } from "node:path";
import type { ZodIssue } from "zod";
import { errnoCode } from "../ingestion/errors.js";
import { ConfigError } from "./errors.js";
import { DocstreamConfigSchema, type DocstreamConfig, type SourceConfig } from "./schema.js";

/**
 * Expand a leading `~` to the user's home directory
 */
export function expandHome(path: string): string {
  if (path === "~") {
    return homedir();
  }
  if (path.startsWith("~/")) {
    return join(homedir(), path.slice(2));
  }
  return path;
}

function resolveFrom(baseDir: string, path: string): string {
  const expanded = expandHome(path);
  return isAbsolute(expanded) ? expanded : resolve(baseDir, expanded);
}

function formatIssue(issue: ZodIssue): string {
  const path = issue.path.join(".");
  return path ? `${path}: ${issue.message}` : issue.message;
}

/**
 * Validate an already-parsed configuration object
 *
 * Relative paths (filesystem roots, index path, token files) are resolved
 * against `baseDir`.
 *
 * @throws {ConfigError} Listing every validation issue
 */
export function parseConfig(raw: unknown, baseDir: string = process.cwd(), configPath?: string): DocstreamConfig {
  const result = DocstreamConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(formatIssue);
    throw new ConfigError(`Invalid configuration${configPath ? ` in ${configPath}` : ""}:\n  ${issues.join("\n  ")}`, {
      issues,
      configPath,
    });
  }

  const config = result.data;
  return {
    ...config,
    engine: { ...config.engine, path: resolveFrom(baseDir, config.engine.path) },
    sources: config.sources.map((source): SourceConfig => {
      switch (source.source) {
        case "fs":
          return { ...source, paths: source.paths.map((p) => resolveFrom(baseDir, p)) };
        case "github":
          if (source.repositories.from === "api" && source.repositories.tokenFile !== undefined) {
            return {
              ...source,
              repositories: { ...source.repositories, tokenFile: resolveFrom(baseDir, source.repositories.tokenFile) },
            };
          }
          return source;
        case "static":
          return source;
      }
    }),
  };
}

/**
 * Read and validate a JSON configuration file
 *
 * @throws {ConfigError} If the file is missing, is not JSON, or fails validation
 */
export async function loadConfig(path: string): Promise<DocstreamConfig> {
  const configPath = resolve(expandHome(path));

  let text: string;
  try {
    text = await readFile(configPath, "utf8");
  } catch (error) {
    const cause = error instanceof Error ? error : undefined;
    const message =
      errnoCode(error) === "ENOENT"
        ? `Config file not found: ${configPath}`
        : `Cannot read config file ${configPath}: ${cause?.message ?? String(error)}`;
    throw new ConfigError(message, { configPath, cause });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    const cause = error instanceof Error ? error : undefined;
    throw new ConfigError(`Invalid JSON in config file ${configPath}: ${cause?.message ?? String(error)}`, {
      configPath,
      cause,
    });
  }

  return parseConfig(raw, dirname(configPath), configPath);
}
