/**
 * Repository listing types
 *
 * @module repositories/types
 */

/**
 * One repository to clone and walk.
 */
export interface RepositoryDescriptor {
  /** Display name, usually `owner/repo` */
  name: string;

  /** URL handed to `git clone` */
  cloneUrl: string;

  /** Branch to check out; the remote's default branch when absent */
  branch?: string;
}

/**
 * Capability producing repository descriptors, once, in a stable order.
 */
export interface RepositoryLister {
  list(): AsyncIterable<RepositoryDescriptor>;
}

/**
 * How clone URLs are formed.
 * - ssh: `git@server:owner/repo.git`
 * - https: `https://server/owner/repo.git`
 */
export type CloneTransport = "ssh" | "https";

/**
 * What the GitHub API lister enumerates.
 */
export type GitHubListTarget =
  | { kind: "starred"; login: string }
  | { kind: "search"; query: string };

/**
 * Configuration for the GitHub API lister.
 */
export interface GitHubListerConfig {
  targets: GitHubListTarget[];

  /** Bearer token; anonymous requests are heavily rate limited */
  token?: string;

  /**
   * GraphQL endpoint
   * @default "https://api.github.com/graphql"
   */
  endpoint?: string;

  /**
   * Repositories requested per page (1-100)
   * @default 50
   */
  pageSize?: number;

  /**
   * Per-request timeout
   * @default 30000
   */
  timeoutMs?: number;

  /**
   * Retries for retryable failures (rate limits, network, 5xx)
   * @default 3
   */
  maxRetries?: number;

  /**
   * @default "https"
   */
  transport?: CloneTransport;
}

/**
 * Pagination state of one in-flight listing.
 * @internal
 */
export interface PageCursor {
  endCursor: string | null;
  hasNextPage: boolean;
}
