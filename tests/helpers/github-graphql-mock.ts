/**
 * Mock GitHub GraphQL endpoint
 *
 * Serves queued responses in order and records every request. Can be passed
 * to the lister as its fetch function, or installed over global fetch.
 */

import type { FetchFn } from "../../src/repositories/github-lister.js";

export interface GraphQLCallLog {
  url: string;
  headers: Record<string, string>;
  query: string;
  variables: Record<string, unknown>;
}

export type MockGraphQLResponse =
  | { status?: number; body: unknown; headers?: Record<string, string> }
  | { networkError: Error };

export interface MockRepository {
  nameWithOwner: string;
  url: string;
  sshUrl: string;
}

/**
 * Build a repository node the way GitHub returns it
 */
export function mockRepository(nameWithOwner: string): MockRepository {
  return {
    nameWithOwner,
    url: `https://github.com/${nameWithOwner}`,
    sshUrl: `git@github.com:${nameWithOwner}.git`,
  };
}

/**
 * Body of one page of a user's starred repositories
 */
export function starredPage(names: string[], endCursor: string | null, hasNextPage: boolean): unknown {
  return {
    data: {
      user: {
        starredRepositories: {
          pageInfo: { hasNextPage, endCursor },
          nodes: names.map(mockRepository),
        },
      },
    },
  };
}

/**
 * Body of one page of repository search results
 */
export function searchPage(names: string[], endCursor: string | null, hasNextPage: boolean): unknown {
  return {
    data: {
      search: {
        pageInfo: { hasNextPage, endCursor },
        nodes: names.map(mockRepository),
      },
    },
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export class MockGitHubGraphQL {
  readonly calls: GraphQLCallLog[] = [];
  private readonly queue: MockGraphQLResponse[] = [];
  private originalFetch: typeof globalThis.fetch | undefined;

  enqueue(...responses: MockGraphQLResponse[]): void {
    this.queue.push(...responses);
  }

  readonly fetch: FetchFn = async (input, init) => {
    const headers: Record<string, string> = {};
    if (isRecord(init.headers)) {
      for (const [key, value] of Object.entries(init.headers)) {
        if (typeof value === "string") headers[key] = value;
      }
    }
    const payload: unknown = typeof init.body === "string" ? JSON.parse(init.body) : {};
    this.calls.push({
      url: input,
      headers,
      query: isRecord(payload) && typeof payload["query"] === "string" ? payload["query"] : "",
      variables: isRecord(payload) && isRecord(payload["variables"]) ? payload["variables"] : {},
    });

    const next = this.queue.shift();
    if (!next) {
      throw new Error("MockGitHubGraphQL: no response queued");
    }
    if ("networkError" in next) {
      throw next.networkError;
    }
    return new Response(JSON.stringify(next.body), {
      status: next.status ?? 200,
      headers: { "content-type": "application/json", ...next.headers },
    });
  };

  /**
   * Replace global fetch with this mock
   */
  install(): void {
    this.originalFetch = globalThis.fetch;
    globalThis.fetch = (input, init) => this.fetch(String(input), init ?? {});
  }

  uninstall(): void {
    if (this.originalFetch) {
      globalThis.fetch = this.originalFetch;
      this.originalFetch = undefined;
    }
  }
}
