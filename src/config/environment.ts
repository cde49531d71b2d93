/**
 * Environment-driven settings
 *
 * Everything else lives in the configuration file; the environment only
 * carries logging, the GitHub token and the default config location.
 *
 * @module config/environment
 */

import { z } from "zod";
import type { LogFormat, LogLevel } from "../logging/types.js";
import { ConfigError } from "./errors.js";

const ENV_KEYS = {
  LOG_LEVEL: "LOG_LEVEL",
  LOG_FORMAT: "LOG_FORMAT",
  GITHUB_TOKEN: "GITHUB_TOKEN",
  CONFIG_PATH: "DOCSTREAM_CONFIG",
} as const;

const LogLevelSchema = z.enum(["silent", "fatal", "error", "warn", "info", "debug", "trace"]);
const LogFormatSchema = z.enum(["json", "pretty"]);

export interface Environment {
  logLevel: LogLevel;
  logFormat: LogFormat;
  githubToken?: string;
  configPath?: string;
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Read settings from environment variables
 *
 * - LOG_LEVEL: default "warn"
 * - LOG_FORMAT: default "pretty"
 * - GITHUB_TOKEN: used for https clones and API listing when no token file is set
 * - DOCSTREAM_CONFIG: configuration file used when `--config` is not given
 *
 * @throws {ConfigError} If LOG_LEVEL or LOG_FORMAT holds an unknown value
 */
export function loadEnvironment(env: NodeJS.ProcessEnv = process.env): Environment {
  const levelRaw = nonEmpty(env[ENV_KEYS.LOG_LEVEL])?.toLowerCase() ?? "warn";
  const level = LogLevelSchema.safeParse(levelRaw);
  if (!level.success) {
    throw new ConfigError(
      `Invalid ${ENV_KEYS.LOG_LEVEL}: "${levelRaw}". Must be one of: ${LogLevelSchema.options.join(", ")}`
    );
  }

  const formatRaw = nonEmpty(env[ENV_KEYS.LOG_FORMAT])?.toLowerCase() ?? "pretty";
  const format = LogFormatSchema.safeParse(formatRaw);
  if (!format.success) {
    throw new ConfigError(
      `Invalid ${ENV_KEYS.LOG_FORMAT}: "${formatRaw}". Must be one of: ${LogFormatSchema.options.join(", ")}`
    );
  }

  return {
    logLevel: level.data,
    logFormat: format.data,
    githubToken: nonEmpty(env[ENV_KEYS.GITHUB_TOKEN]),
    configPath: nonEmpty(env[ENV_KEYS.CONFIG_PATH]),
  };
}
