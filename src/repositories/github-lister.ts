/**
 * GitHub GraphQL repository lister.
 *
 * Lists repositories starred by a user, or matching a search query, one page at
 * a time. Uses the GraphQL API with bearer authentication, rate limit handling
 * and retry with exponential backoff.
 *
 * @module repositories/github-lister
 */

import type { Logger } from "pino";
import { ZodError, type ZodType, type ZodTypeDef } from "zod";

import { getComponentLogger } from "../logging/index.js";
import { channelStream, type ChannelStream } from "../streams/channel-stream.js";
import { DEFAULT_RETRY_CONFIG, createExponentialBackoff, withRetry } from "../utils/retry.js";

import type { GitHubListerConfig, GitHubListTarget, PageCursor, RepositoryDescriptor, RepositoryLister } from "./types.js";
import {
  GitHubAPIError,
  GitHubAuthenticationError,
  GitHubClientError,
  GitHubNetworkError,
  GitHubNotFoundError,
  GitHubRateLimitError,
  GitHubResponseError,
  GitHubValidationError,
  isRetryableStatusCode,
} from "./errors.js";
import {
  GitHubListerConfigSchema,
  SearchResponseSchema,
  StarredResponseSchema,
  type GraphQLErrorEntry,
  type RepositoryConnection,
  type RepositoryNode,
  type ValidatedGitHubListerConfig,
} from "./validation.js";

const STARRED_QUERY = `query StarredRepositories($login: String!, $first: Int!, $after: String) {
  user(login: $login) {
    starredRepositories(first: $first, after: $after, orderBy: { field: STARRED_AT, direction: DESC }) {
      pageInfo { hasNextPage endCursor }
      nodes { nameWithOwner url sshUrl }
    }
  }
}`;

const SEARCH_QUERY = `query SearchRepositories($query: String!, $first: Int!, $after: String) {
  search(query: $query, type: REPOSITORY, first: $first, after: $after) {
    pageInfo { hasNextPage endCursor }
    nodes { ... on Repository { nameWithOwner url sshUrl } }
  }
}`;

export type FetchFn = (input: string, init: RequestInit) => Promise<Response>;

export interface GitHubListerDependencies {
  /** Defaults to the global fetch, looked up per request */
  fetch?: FetchFn;

  /** Injected for tests to skip backoff delays */
  sleep?: (ms: number) => Promise<void>;

  logger?: Logger;
}

interface Page {
  nodes: RepositoryNode[];
  cursor: PageCursor;
}

function isRepositoryNode(node: RepositoryConnection["nodes"][number]): node is RepositoryNode {
  return node !== null && "nameWithOwner" in node;
}

function describeTarget(target: GitHubListTarget): string {
  return target.kind === "starred" ? `starred:${target.login}` : `search:${target.query}`;
}

/**
 * Paginated repository lister backed by the GitHub GraphQL API.
 *
 * Each page request carries the previous page's end cursor; listing of a target
 * stops when the server reports no further pages. Targets are listed in the
 * configured order. A failure that survives retries ends the sequence after the
 * repositories already emitted.
 *
 * @example
 * ```typescript
 * const lister = new GitHubApiLister({
 *   targets: [{ kind: "starred", login: "octocat" }],
 *   token: process.env.GITHUB_TOKEN,
 * });
 * for await (const repo of lister.list()) console.log(repo.name, repo.cloneUrl);
 * ```
 */
export class GitHubApiLister implements RepositoryLister {
  private readonly config: ValidatedGitHubListerConfig;
  private readonly fetchImpl: FetchFn;
  private readonly sleep?: (ms: number) => Promise<void>;
  private readonly logger: Logger;

  /**
   * @throws {GitHubValidationError} If the configuration is invalid
   */
  constructor(config: GitHubListerConfig, deps: GitHubListerDependencies = {}) {
    try {
      this.config = GitHubListerConfigSchema.parse(config);
    } catch (error) {
      if (error instanceof ZodError) {
        const messages = error.issues.map((e) => `${e.path.join(".")}: ${e.message}`);
        throw new GitHubValidationError("Invalid GitHub lister configuration", messages);
      }
      throw error;
    }
    this.fetchImpl = deps.fetch ?? ((input, init) => fetch(input, init));
    this.sleep = deps.sleep;
    this.logger = deps.logger ?? getComponentLogger("repositories:github");

    this.logger.debug(
      {
        endpoint: this.config.endpoint,
        targets: this.config.targets.map(describeTarget),
        hasToken: this.config.token !== undefined,
        pageSize: this.config.pageSize,
      },
      "GitHub lister initialized"
    );
  }

  list(): ChannelStream<RepositoryDescriptor> {
    return channelStream<RepositoryDescriptor>(
      async (tx) => {
        for (const target of this.config.targets) {
          let cursor: PageCursor = { endCursor: null, hasNextPage: true };
          let pages = 0;
          let listed = 0;

          while (cursor.hasNextPage) {
            const page = await this.fetchPageWithRetry(target, cursor.endCursor);
            pages++;

            for (const node of page.nodes) {
              await tx.send(this.toDescriptor(node));
              listed++;
            }
            cursor = page.cursor;
          }

          this.logger.info({ target: describeTarget(target), pages, repositories: listed }, "Listed repositories");
        }
      },
      { name: "github-lister", logger: this.logger }
    );
  }

  private toDescriptor(node: RepositoryNode): RepositoryDescriptor {
    return {
      name: node.nameWithOwner,
      cloneUrl: this.config.transport === "ssh" ? node.sshUrl : `${node.url}.git`,
    };
  }

  private async fetchPageWithRetry(target: GitHubListTarget, after: string | null): Promise<Page> {
    return withRetry(() => this.fetchPage(target, after), {
      maxRetries: this.config.maxRetries,
      shouldRetry: (error) => {
        if (error instanceof GitHubRateLimitError || error instanceof GitHubNetworkError) {
          return true;
        }
        if (error instanceof GitHubAPIError) {
          return error.retryable;
        }
        return false;
      },
      calculateBackoff: createExponentialBackoff(DEFAULT_RETRY_CONFIG),
      onRetry: (attempt, error, delayMs) => {
        this.logger.warn(
          {
            attempt: attempt + 1,
            maxRetries: this.config.maxRetries,
            delayMs,
            target: describeTarget(target),
            error: error.message,
          },
          "Retrying GitHub API request"
        );
      },
      ...(this.sleep && { sleep: this.sleep }),
    });
  }

  private async fetchPage(target: GitHubListTarget, after: string | null): Promise<Page> {
    const first = this.config.pageSize;

    if (target.kind === "starred") {
      const body = await this.post(STARRED_QUERY, { login: target.login, first, after }, StarredResponseSchema);
      this.raiseGraphQLErrors(body.errors, target);
      const user = body.data?.user;
      if (!user) {
        throw new GitHubNotFoundError(`GitHub user '${target.login}' not found`, target.login);
      }
      return this.toPage(user.starredRepositories);
    }

    const body = await this.post(SEARCH_QUERY, { query: target.query, first, after }, SearchResponseSchema);
    this.raiseGraphQLErrors(body.errors, target);
    if (!body.data) {
      throw new GitHubResponseError("GraphQL response carried no data");
    }
    return this.toPage(body.data.search);
  }

  private toPage(connection: RepositoryConnection): Page {
    const { hasNextPage, endCursor } = connection.pageInfo;
    if (hasNextPage && endCursor === null) {
      throw new GitHubResponseError("GraphQL page reports more results but no end cursor");
    }
    return {
      nodes: connection.nodes.filter(isRepositoryNode),
      cursor: { hasNextPage, endCursor },
    };
  }

  private raiseGraphQLErrors(errors: GraphQLErrorEntry[] | undefined, target: GitHubListTarget): void {
    if (!errors || errors.length === 0) {
      return;
    }
    const message = errors.map((e) => e.message).join("; ");
    if (errors.some((e) => e.type === "RATE_LIMITED")) {
      throw new GitHubRateLimitError(`GitHub API rate limit exceeded: ${message}`);
    }
    if (errors.some((e) => e.type === "NOT_FOUND")) {
      throw new GitHubNotFoundError(`GitHub resource not found: ${message}`, describeTarget(target));
    }
    throw new GitHubAPIError(`GitHub GraphQL error: ${message}`, 200);
  }

  /**
   * Perform a single GraphQL request and validate the body against `schema`
   */
  private async post<T>(query: string, variables: Record<string, unknown>, schema: ZodType<T, ZodTypeDef, unknown>): Promise<T> {
    const headers: Record<string, string> = {
      Accept: "application/vnd.github+json",
      "Content-Type": "application/json",
      "User-Agent": "docstream/1.0",
    };
    if (this.config.token) {
      headers["Authorization"] = `Bearer ${this.config.token}`;
    }

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.config.timeoutMs);

    try {
      const response = await this.fetchImpl(this.config.endpoint, {
        method: "POST",
        headers,
        body: JSON.stringify({ query, variables }),
        signal: controller.signal,
      });

      if (!response.ok) {
        await this.handleErrorResponse(response);
      }

      const body: unknown = await response.json();
      const parsed = schema.safeParse(body);
      if (!parsed.success) {
        throw new GitHubResponseError(
          "Unexpected GitHub GraphQL response shape",
          parsed.error.issues.map((e) => `${e.path.join(".")}: ${e.message}`)
        );
      }
      return parsed.data;
    } catch (error) {
      if (error instanceof GitHubClientError) {
        throw error;
      }
      if (error instanceof Error && error.name === "AbortError") {
        throw new GitHubNetworkError(`Request timeout after ${this.config.timeoutMs}ms`, error);
      }
      if (error instanceof SyntaxError) {
        throw new GitHubResponseError(`GitHub response is not valid JSON: ${error.message}`, [], error);
      }
      throw new GitHubNetworkError(
        `Network error: ${sanitizeErrorMessage(error instanceof Error ? error.message : String(error))}`,
        error
      );
    } finally {
      clearTimeout(timeoutId);
    }
  }

  /**
   * Map an HTTP error response onto the error family
   */
  private async handleErrorResponse(response: Response): Promise<never> {
    const status = response.status;
    const statusText = response.statusText;

    let errorMessage = statusText;
    try {
      const body: unknown = await response.json();
      if (typeof body === "object" && body !== null && "message" in body && typeof body.message === "string") {
        errorMessage = body.message;
      }
    } catch (error) {
      this.logger.debug({ status, err: error }, "GitHub error response has no JSON body");
    }

    const rateLimitRemaining = response.headers.get("x-ratelimit-remaining");
    const isRateLimited =
      status === 429 ||
      (status === 403 && (rateLimitRemaining === "0" || errorMessage.toLowerCase().includes("rate limit")));

    if (isRateLimited) {
      const resetHeader = response.headers.get("x-ratelimit-reset");
      const resetAt = resetHeader ? new Date(parseInt(resetHeader, 10) * 1000) : undefined;
      const retryAfterHeader = response.headers.get("retry-after");
      const retryAfterMs = retryAfterHeader
        ? parseInt(retryAfterHeader, 10) * 1000
        : resetAt
          ? Math.max(0, resetAt.getTime() - Date.now())
          : undefined;
      throw new GitHubRateLimitError(
        `GitHub API rate limit exceeded. Reset at ${resetAt?.toISOString() ?? "unknown"}.`,
        resetAt,
        retryAfterMs
      );
    }

    switch (status) {
      case 401:
        throw new GitHubAuthenticationError("GitHub authentication failed. Check your GITHUB_TOKEN.");
      case 403:
        throw new GitHubAuthenticationError(`Access denied: ${errorMessage}`);
      case 404:
        throw new GitHubNotFoundError(`GraphQL endpoint not found: ${this.config.endpoint}`, this.config.endpoint);
      default:
        throw new GitHubAPIError(
          `GitHub API error: ${errorMessage}`,
          status,
          statusText,
          isRetryableStatusCode(status)
        );
    }
  }
}

/**
 * Remove token-like strings from error messages
 */
export function sanitizeErrorMessage(message: string): string {
  return message
    .replace(/gh[pousr]_[A-Za-z0-9]{36,}/g, "[REDACTED]")
    .replace(/github_pat_[A-Za-z0-9_]{82}/g, "[REDACTED]")
    .replace(/Bearer [A-Za-z0-9_-]+/gi, "Bearer [REDACTED]");
}
