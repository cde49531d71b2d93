/**
 * Output Formatters for CLI
 *
 * Functions for formatting output as tables or JSON.
 */

import Table from "cli-table3";
import chalk from "chalk";
import type { FoundItem } from "../../documents/types.js";
import type { IngestionSummary } from "../../services/ingestion-types.js";

/**
 * Truncate a string to a maximum length, adding ellipsis if truncated
 */
export function truncate(str: string, maxLength: number): string {
  if (maxLength < 4) return str.substring(0, maxLength);
  if (str.length <= maxLength) {
    return str;
  }
  return str.substring(0, maxLength - 3) + "...";
}

/**
 * Format duration in milliseconds to human readable string
 *
 * @example
 * formatDuration(500) // "500ms"
 * formatDuration(2340) // "2.3s"
 * formatDuration(75000) // "1m 15s"
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60000) return `${(ms / 1000).toFixed(1)}s`;
  const minutes = Math.floor(ms / 60000);
  const seconds = Math.floor((ms % 60000) / 1000);
  return `${minutes}m ${seconds}s`;
}

/**
 * Render `<mark>` highlights for a terminal and collapse whitespace
 */
export function renderSnippet(snippet: string): string {
  return snippet
    .replace(/<mark>(.*?)<\/mark>/g, (_match, text: string) => chalk.bold.yellow(text))
    .replace(/\s+/g, " ")
    .trim();
}

/**
 * Create a table of search results
 */
export function createSearchResultsTable(results: readonly FoundItem[], queryTimeMs: number): string {
  if (results.length === 0) {
    return (
      chalk.yellow("No results found.") +
      "\n\n" +
      chalk.bold("Tips:") +
      "\n  • Try a different query" +
      "\n  • Check that the sources have been indexed: " +
      chalk.gray("docstream index")
    );
  }

  const table = new Table({
    head: [chalk.cyan("#"), chalk.cyan("Source"), chalk.cyan("Title"), chalk.cyan("Snippet"), chalk.cyan("Score")],
    colAligns: ["right", "left", "left", "left", "right"],
    style: {
      head: [],
      border: ["gray"],
    },
  });

  results.forEach((result, i) => {
    table.push([
      (i + 1).toString(),
      truncate(result.source, 20),
      truncate(result.title, 30),
      renderSnippet(truncate(result.snippet, 80)),
      chalk.green(result.score.toFixed(2)),
    ]);
  });

  const header = chalk.bold(`\nFound ${results.length} result${results.length === 1 ? "" : "s"} in ${queryTimeMs}ms\n`);
  return header + table.toString();
}

/**
 * One search result as a single JSON line
 */
export function formatSearchResultJson(result: FoundItem): string {
  return JSON.stringify({
    id: result.id,
    score: result.score,
    source: result.source,
    title: result.title,
    link: result.link,
    snippet: result.snippet,
  });
}

/**
 * Create a per-source table for a finished ingestion run
 */
export function createIngestionSummaryTable(summary: IngestionSummary): string {
  const table = new Table({
    head: [chalk.cyan("Source"), chalk.cyan("Documents"), chalk.cyan("Batches"), chalk.cyan("Duration")],
    colAligns: ["left", "right", "right", "right"],
    style: {
      head: [],
      border: ["gray"],
    },
  });

  for (const source of summary.sources) {
    table.push([source.sourceId, source.documents.toString(), source.batches.toString(), formatDuration(source.durationMs)]);
  }

  return table.toString();
}
