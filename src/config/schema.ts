/**
 * Configuration file schema
 *
 * @module config/schema
 */

import { tmpdir } from "node:os";
import { join } from "node:path";
import { z } from "zod";

/**
 * Index location used when the configuration names none
 */
export function defaultIndexPath(): string {
  return join(tmpdir(), "docstream_index");
}

const SourceIdSchema = z
  .string()
  .trim()
  .min(1, "Source id must not be empty")
  .regex(/^[A-Za-z0-9._-]+$/, "Source id may only contain letters, digits, '.', '_' and '-'");

const PatternListSchema = z.array(z.string()).default([]);

const TransportSchema = z.enum(["ssh", "https"]);

export const FileSystemSourceConfigSchema = z.object({
  source: z.literal("fs"),
  id: SourceIdSchema,
  paths: z.array(z.string().min(1)).min(1, "At least one path is required"),
  include: PatternListSchema,
  exclude: PatternListSchema,
});

const RepositoryReferenceSchema = z.object({
  name: z.string().regex(/^[^/\s]+\/[^/\s]+$/, "Repository name must look like 'owner/repo'"),
  branch: z.string().min(1).optional(),
});

const RepositoryListConfigSchema = z.object({
  from: z.literal("list"),
  server: z.string().min(1).default("github.com"),
  transport: TransportSchema.default("ssh"),
  list: z.array(RepositoryReferenceSchema),
});

const RepositoryApiConfigSchema = z.object({
  from: z.literal("api"),
  starredBy: z.array(z.string().min(1)).default([]),
  search: z.string().min(1).optional(),
  endpoint: z.string().url("Invalid GraphQL endpoint").optional(),
  tokenFile: z.string().min(1).optional(),
  transport: TransportSchema.default("https"),
  pageSize: z.number().int().min(1).max(100).optional(),
});

export const GitHubSourceConfigSchema = z.object({
  source: z.literal("github"),
  id: SourceIdSchema,
  repositories: z.discriminatedUnion("from", [RepositoryListConfigSchema, RepositoryApiConfigSchema]),
  include: PatternListSchema,
  exclude: PatternListSchema,
});

const StaticDocumentSchema = z.object({
  id: z.string().min(1, "Document id must not be empty"),
  title: z.string(),
  link: z.string(),
  content: z.string(),
  metadata: z.record(z.string()).default({}),
});

export const StaticSourceConfigSchema = z.object({
  source: z.literal("static"),
  id: SourceIdSchema,
  documents: z.array(StaticDocumentSchema),
});

export const SourceConfigSchema = z.discriminatedUnion("source", [
  FileSystemSourceConfigSchema,
  GitHubSourceConfigSchema,
  StaticSourceConfigSchema,
]);

export const EngineConfigSchema = z.object({
  use: z.literal("sqlite"),
  path: z.string().min(1).default(defaultIndexPath),
  readerRefresh: z.enum(["on-commit", "manual"]).default("on-commit"),
});

export const DocstreamConfigSchema = z
  .object({
    sources: z.array(SourceConfigSchema).min(1, "At least one source is required"),
    engine: EngineConfigSchema.default({ use: "sqlite" }),
    batchSize: z.number().int().min(1).max(1000).default(10),
  })
  .superRefine((config, ctx) => {
    const seen = new Set<string>();
    config.sources.forEach((source, index) => {
      if (seen.has(source.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["sources", index, "id"],
          message: `Duplicate source id '${source.id}'`,
        });
      }
      seen.add(source.id);

      if (
        source.source === "github" &&
        source.repositories.from === "api" &&
        source.repositories.starredBy.length === 0 &&
        source.repositories.search === undefined
      ) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["sources", index, "repositories"],
          message: "Set 'starredBy' or 'search' to list repositories from the API",
        });
      }
    });
  });

export type DocstreamConfig = z.infer<typeof DocstreamConfigSchema>;
export type SourceConfig = z.infer<typeof SourceConfigSchema>;
export type FileSystemSourceConfig = z.infer<typeof FileSystemSourceConfigSchema>;
export type GitHubSourceConfig = z.infer<typeof GitHubSourceConfigSchema>;
export type StaticSourceConfig = z.infer<typeof StaticSourceConfigSchema>;
export type EngineConfig = z.infer<typeof EngineConfigSchema>;
