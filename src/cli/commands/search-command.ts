/**
 * Search Command - Query the full-text index
 */

/* eslint-disable no-console */

import type { CliDependencies } from "../utils/dependency-init.js";
import type { SearchCommandOptions } from "../utils/validation.js";
import { createSearchResultsTable, formatSearchResultJson } from "../output/formatters.js";

/**
 * Execute search command
 *
 * With `--json`, results are printed one JSON object per line as the engine
 * yields them; otherwise they are collected into a table.
 */
export async function searchCommand(
  query: string,
  options: SearchCommandOptions,
  deps: CliDependencies
): Promise<void> {
  if (options.json) {
    for await (const item of deps.engine.search(query)) {
      console.log(formatSearchResultJson(item));
    }
    return;
  }

  const startTime = performance.now();
  const results = await deps.ingestionService.search(query);
  console.log(createSearchResultsTable(results, Math.round(performance.now() - startTime)));
  console.log();
}
