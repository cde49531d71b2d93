/**
 * Repository listers: where git-backed sources get their repositories from.
 *
 * @module repositories
 */

export type {
  RepositoryDescriptor,
  RepositoryLister,
  CloneTransport,
  GitHubListTarget,
  GitHubListerConfig,
  PageCursor,
} from "./types.js";
export { StaticListLister, buildCloneUrl } from "./static-list-lister.js";
export type { RepositoryReference, CloneUrlOptions } from "./static-list-lister.js";
export { GitHubApiLister } from "./github-lister.js";
export type { GitHubListerDependencies, FetchFn } from "./github-lister.js";
export {
  GitHubClientError,
  GitHubAuthenticationError,
  GitHubRateLimitError,
  GitHubNotFoundError,
  GitHubNetworkError,
  GitHubAPIError,
  GitHubResponseError,
  GitHubValidationError,
  isRetryableGitHubError,
  isRetryableStatusCode,
} from "./errors.js";
