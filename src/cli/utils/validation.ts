/**
 * Runtime validation schemas for CLI command options
 *
 * Uses Zod for type-safe runtime validation of Commander.js options.
 */

import { z } from "zod";

const SourceIdOptionSchema = z.string().trim().min(1, "--source must not be empty");

/**
 * Schema for options shared by every command
 */
export const GlobalOptionsSchema = z.object({
  config: z.string().min(1).optional(),
});

/**
 * Schema for index command options
 */
export const IndexCommandOptionsSchema = z.object({
  source: z.array(SourceIdOptionSchema).default([]),
});

/**
 * Schema for search command options
 */
export const SearchCommandOptionsSchema = z.object({
  json: z.boolean().optional(),
});

/**
 * Schema for purge command options
 */
export const PurgeCommandOptionsSchema = z.object({
  source: SourceIdOptionSchema.optional(),
});

export type GlobalOptions = z.infer<typeof GlobalOptionsSchema>;
export type IndexCommandOptions = z.infer<typeof IndexCommandOptionsSchema>;
export type SearchCommandOptions = z.infer<typeof SearchCommandOptionsSchema>;
export type PurgeCommandOptions = z.infer<typeof PurgeCommandOptionsSchema>;

/**
 * Commander collector for repeatable options
 */
export function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}
