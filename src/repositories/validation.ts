/**
 * Zod schemas for the GitHub API lister: its configuration and the GraphQL
 * payloads it reads.
 *
 * @module repositories/validation
 */

import { z } from "zod";

const TIMEOUT_MIN_MS = 1000;
const TIMEOUT_MAX_MS = 300000;
const TIMEOUT_DEFAULT_MS = 30000;
const MAX_RETRIES_LIMIT = 10;
const MAX_RETRIES_DEFAULT = 3;
const PAGE_SIZE_MAX = 100;
const PAGE_SIZE_DEFAULT = 50;

export const GitHubLoginSchema = z
  .string()
  .min(1, "Login is required")
  .max(39, "Login must be at most 39 characters")
  .regex(/^[a-zA-Z0-9](?:[a-zA-Z0-9]|-(?=[a-zA-Z0-9])){0,38}$/, "Invalid GitHub username");

export const GitHubListTargetSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("starred"), login: GitHubLoginSchema }),
  z.object({ kind: z.literal("search"), query: z.string().min(1, "Search query cannot be empty") }),
]);

export const GitHubListerConfigSchema = z.object({
  targets: z.array(GitHubListTargetSchema).min(1, "At least one starred user or search query is required"),
  token: z.string().min(1).optional(),
  endpoint: z.string().url("Invalid GraphQL endpoint").optional().default("https://api.github.com/graphql"),
  pageSize: z.number().int().min(1).max(PAGE_SIZE_MAX).optional().default(PAGE_SIZE_DEFAULT),
  timeoutMs: z
    .number()
    .int()
    .min(TIMEOUT_MIN_MS, `Timeout must be at least ${TIMEOUT_MIN_MS}ms`)
    .max(TIMEOUT_MAX_MS, `Timeout must be at most ${TIMEOUT_MAX_MS}ms`)
    .optional()
    .default(TIMEOUT_DEFAULT_MS),
  maxRetries: z
    .number()
    .int()
    .min(0, "Max retries must be non-negative")
    .max(MAX_RETRIES_LIMIT, `Max retries must be at most ${MAX_RETRIES_LIMIT}`)
    .optional()
    .default(MAX_RETRIES_DEFAULT),
  transport: z.enum(["ssh", "https"]).optional().default("https"),
});

export type ValidatedGitHubListerConfig = z.infer<typeof GitHubListerConfigSchema>;

const RepositoryNodeSchema = z.object({
  nameWithOwner: z.string().min(1),
  url: z.string().min(1),
  sshUrl: z.string().min(1),
});

const PageInfoSchema = z.object({
  hasNextPage: z.boolean(),
  endCursor: z.string().nullable(),
});

/**
 * Search results can include non-repository nodes (empty objects); those are skipped.
 */
const RepositoryConnectionSchema = z.object({
  pageInfo: PageInfoSchema,
  nodes: z.array(RepositoryNodeSchema.nullable().or(z.object({}).strict())),
});

const GraphQLErrorSchema = z.object({
  message: z.string(),
  type: z.string().optional(),
});

export const StarredResponseSchema = z.object({
  data: z
    .object({
      user: z.object({ starredRepositories: RepositoryConnectionSchema }).nullable(),
    })
    .nullable()
    .optional(),
  errors: z.array(GraphQLErrorSchema).optional(),
});

export const SearchResponseSchema = z.object({
  data: z
    .object({
      search: RepositoryConnectionSchema,
    })
    .nullable()
    .optional(),
  errors: z.array(GraphQLErrorSchema).optional(),
});

export type RepositoryNode = z.infer<typeof RepositoryNodeSchema>;
export type RepositoryConnection = z.infer<typeof RepositoryConnectionSchema>;
export type GraphQLErrorEntry = z.infer<typeof GraphQLErrorSchema>;
