/**
 * Purge Command - Remove documents from the index
 */

/* eslint-disable no-console */

import chalk from "chalk";
import type { CliDependencies } from "../utils/dependency-init.js";
import type { PurgeCommandOptions } from "../utils/validation.js";

/**
 * Execute purge command
 *
 * Removes every document, or only those of `options.source`. The source does
 * not have to be configured any more, so documents of a deleted source can
 * still be dropped.
 *
 * @returns Number of documents removed
 */
export async function purgeCommand(options: PurgeCommandOptions, deps: CliDependencies): Promise<number> {
  const removed = await deps.engine.purge(options.source);

  const scope = options.source !== undefined ? ` from source '${options.source}'` : "";
  console.log(chalk.green(`✓ Removed ${removed} document${removed === 1 ? "" : "s"}${scope}`));
  return removed;
}
