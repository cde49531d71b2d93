#!/usr/bin/env node
/**
 * docstream - CLI Entry Point
 *
 * - index: Fetch configured sources and index their documents
 * - search: Query the index
 * - purge: Remove documents from the index
 */

import "dotenv/config";
import { Command } from "commander";
import { withDependencies } from "./utils/dependency-init.js";
import { handleCommandError } from "./utils/error-handler.js";
import { indexCommand } from "./commands/index-command.js";
import { searchCommand } from "./commands/search-command.js";
import { purgeCommand } from "./commands/purge-command.js";
import {
  GlobalOptionsSchema,
  IndexCommandOptionsSchema,
  PurgeCommandOptionsSchema,
  SearchCommandOptionsSchema,
  collect,
} from "./utils/validation.js";

const program = new Command();

program
  .name("docstream")
  .description("Stream documents from files, static lists and git repositories into a full-text index")
  .version("0.1.0")
  .option("-c, --config <path>", "Configuration file (default: $DOCSTREAM_CONFIG)");

function globalOptions(): { configPath?: string } {
  return { configPath: GlobalOptionsSchema.parse(program.opts()).config };
}

// Index command
program
  .command("index")
  .description("Fetch every configured source and index its documents")
  .option("-s, --source <id>", "Only index this source (repeatable)", collect, [])
  .action(async (options: Record<string, unknown>) => {
    try {
      const validatedOptions = IndexCommandOptionsSchema.parse(options);
      await withDependencies(globalOptions(), async (deps) => {
        await indexCommand(validatedOptions, deps);
      });
    } catch (error) {
      handleCommandError(error);
    }
  });

// Search command
program
  .command("search")
  .description("Search the index (top 10 results)")
  .argument("<query>", "Full-text query")
  .option("--json", "Print one JSON object per result")
  .action(async (query: string, options: Record<string, unknown>) => {
    try {
      const validatedOptions = SearchCommandOptionsSchema.parse(options);
      await withDependencies(globalOptions(), (deps) => searchCommand(query, validatedOptions, deps));
    } catch (error) {
      handleCommandError(error);
    }
  });

// Purge command
program
  .command("purge")
  .description("Remove documents from the index")
  .option("-s, --source <id>", "Only remove documents of this source")
  .action(async (options: Record<string, unknown>) => {
    try {
      const validatedOptions = PurgeCommandOptionsSchema.parse(options);
      await withDependencies(globalOptions(), async (deps) => {
        await purgeCommand(validatedOptions, deps);
      });
    } catch (error) {
      handleCommandError(error);
    }
  });

await program.parseAsync();
