/**
 * Type definitions for document sources.
 *
 * @module ingestion/types
 */

import type { Document } from "../documents/types.js";
import type { ChannelStream } from "../streams/channel-stream.js";

/**
 * Capability producing a single-shot sequence of documents.
 *
 * The sequence ends after the last document or with exactly one terminal error.
 * Every document's `source` equals {@link id}.
 */
export interface DocumentSource {
  /** Configured source identifier */
  readonly id: string;

  /** Start producing documents */
  fetch(): ChannelStream<Document>;
}

/**
 * Include/exclude pattern strings as they appear in configuration.
 */
export interface FilterPatterns {
  include?: readonly string[];
  exclude?: readonly string[];
}

/**
 * Options for cloning a repository.
 */
export interface CloneOptions {
  /**
   * Specific branch to clone. Defaults to the remote's default branch.
   */
  branch?: string;

  /**
   * Perform a shallow clone (depth=1).
   *
   * @default true
   */
  shallow?: boolean;
}

/**
 * Result of a successful clone operation.
 */
export interface CloneResult {
  /** Local directory holding the working tree (no `.git`) */
  path: string;

  /** Branch that was requested, or "default" */
  branch: string;

  durationMs: number;
}

/**
 * Configuration for the RepositoryCloner.
 */
export interface RepositoryClonerConfig {
  /**
   * GitHub token for private repository access over https.
   * Never logged.
   */
  githubToken?: string;
}

/**
 * Anything that can clone a repository into a directory.
 *
 * Implemented by RepositoryCloner; tests substitute in-process fakes.
 */
export interface Cloner {
  clone(url: string, targetPath: string, options?: CloneOptions): Promise<CloneResult>;
}
