/**
 * Index Command - Ingest configured sources into the search index
 *
 * Sources run one after another; the first failure stops the run. Ctrl-C
 * stops after the batch being indexed is committed.
 */

/* eslint-disable no-console */

import chalk from "chalk";
import type { CliDependencies } from "../utils/dependency-init.js";
import type { IndexCommandOptions } from "../utils/validation.js";
import type { IngestionSummary } from "../../services/ingestion-types.js";
import { createIngestionSummaryTable } from "../output/formatters.js";
import { completeIndexSpinner, createIndexSpinner, updateIndexSpinner } from "../output/progress.js";

/**
 * Execute index command
 *
 * @param options - `source` narrows the run to the named sources
 */
export async function indexCommand(options: IndexCommandOptions, deps: CliDependencies): Promise<IngestionSummary> {
  const sources = await deps.sources(options.source);

  const spinner = createIndexSpinner(sources.length);
  const controller = new AbortController();
  const onInterrupt = (): void => {
    spinner.text = chalk.yellow("Stopping after the current batch...");
    controller.abort();
  };
  process.once("SIGINT", onInterrupt);

  try {
    const summary = await deps.ingestionService.ingest(sources, {
      signal: controller.signal,
      onProgress: (progress) => updateIndexSpinner(spinner, progress),
    });

    completeIndexSpinner(spinner, summary);
    console.log(createIngestionSummaryTable(summary));
    return summary;
  } catch (error) {
    spinner.fail(chalk.red("Indexing failed"));
    throw error;
  } finally {
    process.removeListener("SIGINT", onInterrupt);
  }
}
