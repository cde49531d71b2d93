/**
 * Repository cloning for git-backed document sources.
 *
 * @module ingestion/repository-cloner
 */

import { simpleGit } from "simple-git";
import { rm } from "node:fs/promises";
import { join } from "node:path";
import type pino from "pino";
import { getComponentLogger } from "../logging/index.js";
import type { CloneOptions, CloneResult, Cloner, RepositoryClonerConfig } from "./types.js";
import { ValidationError, CloneError, NetworkError, AuthenticationError, asError } from "./errors.js";

/**
 * Git clone option flags and defaults.
 */
const CLONE_OPTIONS = {
  DEPTH_FLAG: "--depth",
  SHALLOW_DEPTH: "1",
  BRANCH_FLAG: "--branch",
} as const;

/**
 * Accepted clone URL shapes: https/http/ssh/file URLs and scp-like `git@host:owner/repo(.git)`.
 */
const URL_PATTERNS = [/^(https?|ssh|file):\/\/\S+$/, /^[\w.-]+@[\w.-]+:[\w./-]+$/] as const;

/**
 * The part of simple-git the cloner uses.
 */
export interface GitClient {
  clone(repoPath: string, localPath: string, options: string[]): Promise<unknown>;
}

/**
 * Clones repositories into caller-owned directories.
 *
 * Shallow clones by default. After a successful clone the `.git` directory is
 * removed so only the working tree remains.
 *
 * @example
 * ```typescript
 * const cloner = new RepositoryCloner({ githubToken: process.env.GITHUB_TOKEN });
 * await cloner.clone("https://github.com/acme/handbook.git", "/tmp/docstream-x1y2", { branch: "main" });
 * ```
 */
export class RepositoryCloner implements Cloner {
  private readonly config: RepositoryClonerConfig;
  private readonly git: GitClient;
  private _logger: pino.Logger | null;

  private get logger(): pino.Logger {
    if (!this._logger) {
      this._logger = getComponentLogger("ingestion:repository-cloner");
    }
    return this._logger;
  }

  /**
   * @param git - Injected for tests; defaults to a simple-git instance
   */
  constructor(config: RepositoryClonerConfig = {}, git?: GitClient, logger?: pino.Logger) {
    this.config = config;
    this.git = git ?? simpleGit();
    this._logger = logger ?? null;
  }

  /**
   * Clone `url` into `targetPath` and strip its `.git` directory.
   *
   * @throws {ValidationError} If the URL or target path is unusable
   * @throws {AuthenticationError} If the remote rejects the credentials or hides the repository
   * @throws {NetworkError} If the remote could not be reached
   * @throws {CloneError} For any other git failure
   */
  async clone(url: string, targetPath: string, options: CloneOptions = {}): Promise<CloneResult> {
    const startTime = Date.now();

    this.validateUrl(url);
    if (!targetPath || targetPath.trim() === "") {
      throw new ValidationError("Clone target path cannot be empty", "targetPath");
    }

    const shallow = options.shallow !== false;
    const branch = options.branch;
    const safeUrl = sanitizeUrl(url);

    const cloneOptions: string[] = [];
    if (shallow) {
      cloneOptions.push(CLONE_OPTIONS.DEPTH_FLAG, CLONE_OPTIONS.SHALLOW_DEPTH);
    }
    if (branch) {
      cloneOptions.push(CLONE_OPTIONS.BRANCH_FLAG, branch);
    }

    this.logger.debug({ url: safeUrl, targetPath, shallow, branch }, "Executing git clone");

    try {
      await this.git.clone(this.buildAuthenticatedUrl(url), targetPath, cloneOptions);
    } catch (error) {
      this.logger.error(
        { err: error, url: safeUrl, targetPath, durationMs: Date.now() - startTime },
        "Clone operation failed"
      );
      throw classifyCloneError(asError(error), safeUrl, targetPath);
    }

    // Working tree only
    await rm(join(targetPath, ".git"), { recursive: true, force: true });

    const durationMs = Date.now() - startTime;
    this.logger.info(
      {
        metric: "repository.clone_duration_ms",
        value: durationMs,
        url: safeUrl,
        targetPath,
        shallow,
      },
      "Repository cloned"
    );

    return { path: targetPath, branch: branch ?? "default", durationMs };
  }

  private validateUrl(url: string): void {
    const trimmed = url.trim();
    if (trimmed === "") {
      throw new ValidationError("Repository URL cannot be empty", "url");
    }
    if (!URL_PATTERNS.some((pattern) => pattern.test(trimmed))) {
      throw new ValidationError(
        `Unsupported repository URL '${sanitizeUrl(trimmed)}'. Expected https://, ssh://, file:// or git@host:owner/repo`,
        "url"
      );
    }
  }

  /**
   * Inject the GitHub token into https://github.com URLs. The result is never logged.
   */
  private buildAuthenticatedUrl(url: string): string {
    if (!this.config.githubToken || !url.startsWith("https://")) {
      return url;
    }

    const parsed = new URL(url);
    if (parsed.hostname !== "github.com") {
      return url;
    }
    parsed.username = this.config.githubToken;
    parsed.password = "x-oauth-basic";
    return parsed.toString();
  }
}

/**
 * Map a git failure onto the clone error family, based on git's stderr text.
 */
export function classifyCloneError(error: Error, url: string, targetPath: string): Error {
  const message = error.message.toLowerCase();
  const sanitized = sanitizeErrorMessage(error.message);

  if (
    message.includes("authentication failed") ||
    message.includes("could not read username") ||
    message.includes("permission denied (publickey)") ||
    message.includes("not found") ||
    message.includes("403")
  ) {
    return new AuthenticationError(
      `Authentication failed for repository. For private repositories, configure GITHUB_TOKEN or an SSH key. (${sanitized})`,
      url,
      error
    );
  }

  if (
    message.includes("could not resolve host") ||
    message.includes("failed to connect") ||
    message.includes("connection timed out") ||
    message.includes("network")
  ) {
    return new NetworkError(`Network error while cloning repository: ${sanitized}`, url, targetPath, error);
  }

  return new CloneError(`Failed to clone repository: ${sanitized}`, url, targetPath, error);
}

/**
 * Remove credentials from a URL for logging.
 */
export function sanitizeUrl(url: string): string {
  if (!/^[a-z]+:\/\//i.test(url)) {
    return url;
  }
  try {
    const parsed = new URL(url);
    parsed.username = "";
    parsed.password = "";
    return parsed.toString();
  } catch {
    return url.replace(/\/\/[^@/]+@/, "//");
  }
}

/**
 * Remove credentials embedded in URLs inside git error messages.
 */
export function sanitizeErrorMessage(message: string): string {
  return message.replace(/https:\/\/[^:/\s]+:[^@\s]+@/g, "https://***@");
}
