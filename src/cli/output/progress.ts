/**
 * Progress Indicators for CLI
 *
 * Functions for creating and updating progress spinners during long operations.
 */

import ora, { type Ora } from "ora";
import chalk from "chalk";
import type { IngestionProgress, IngestionSummary } from "../../services/ingestion-types.js";
import { formatDuration } from "./formatters.js";

/**
 * Create a spinner for an ingestion run
 */
export function createIndexSpinner(sourceCount: number): Ora {
  return ora({
    text: `Indexing ${chalk.cyan(sourceCount.toString())} source${sourceCount === 1 ? "" : "s"}...`,
    color: "cyan",
  }).start();
}

/**
 * Spinner text for a progress event
 */
export function describeProgress(progress: IngestionProgress): string {
  const source = chalk.cyan(progress.sourceId);
  switch (progress.phase) {
    case "fetching":
      return `Fetching documents from ${source}...`;
    case "indexed":
      return `Indexing ${source} (${progress.documents} documents in ${progress.batches} batches)...`;
    case "completed":
      return `Finished ${source} (${progress.documents} documents)`;
  }
}

/**
 * Update spinner text based on ingestion progress
 */
export function updateIndexSpinner(spinner: Ora, progress: IngestionProgress): void {
  spinner.text = describeProgress(progress);
}

/**
 * Complete spinner with the run's totals
 */
export function completeIndexSpinner(spinner: Ora, summary: IngestionSummary): void {
  spinner.succeed(
    chalk.green("Indexing complete!") +
      "\n" +
      `  Sources: ${chalk.cyan(summary.sources.length.toString())}` +
      "\n" +
      `  Documents indexed: ${chalk.cyan(summary.totalDocuments.toString())}` +
      "\n" +
      `  Duration: ${chalk.cyan(formatDuration(summary.durationMs))}`
  );
}
