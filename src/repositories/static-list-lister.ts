/**
 * Static repository list.
 *
 * @module repositories/static-list-lister
 */

import type { CloneTransport, RepositoryDescriptor, RepositoryLister } from "./types.js";

/**
 * A repository named in configuration, before its clone URL is built.
 */
export interface RepositoryReference {
  /** `owner/repo` */
  name: string;
  branch?: string;
}

export interface CloneUrlOptions {
  /** @default "github.com" */
  server?: string;
  /** @default "ssh" */
  transport?: CloneTransport;
}

/**
 * Build the clone URL for `owner/repo` on a git server.
 *
 * @example
 * ```typescript
 * buildCloneUrl("acme/handbook"); // "git@github.com:acme/handbook.git"
 * buildCloneUrl("acme/handbook", { transport: "https" }); // "https://github.com/acme/handbook.git"
 * ```
 */
export function buildCloneUrl(name: string, options: CloneUrlOptions = {}): string {
  const server = options.server ?? "github.com";
  const transport = options.transport ?? "ssh";
  return transport === "ssh" ? `git@${server}:${name}.git` : `https://${server}/${name}.git`;
}

/**
 * Replays a fixed set of repositories once, in declaration order.
 */
export class StaticListLister implements RepositoryLister {
  private readonly repositories: readonly RepositoryDescriptor[];

  constructor(repositories: readonly RepositoryDescriptor[]) {
    this.repositories = [...repositories];
  }

  /**
   * Build a lister from `owner/repo` references on one server.
   */
  static fromReferences(references: readonly RepositoryReference[], options: CloneUrlOptions = {}): StaticListLister {
    return new StaticListLister(
      references.map((ref) => ({
        name: ref.name,
        cloneUrl: buildCloneUrl(ref.name, options),
        ...(ref.branch !== undefined && { branch: ref.branch }),
      }))
    );
  }

  async *list(): AsyncGenerator<RepositoryDescriptor> {
    for (const repository of this.repositories) {
      yield { ...repository };
    }
  }
}
