/**
 * Centralized Error Handler for CLI Commands
 *
 * Maps errors to user-friendly messages with actionable next steps.
 */

/* eslint-disable no-console */

import chalk from "chalk";
import { ZodError } from "zod";
import { ConfigError } from "../../config/errors.js";
import {
  AuthenticationError,
  FileReadError,
  FileScanError,
  NetworkError,
  RepositoryCloneError,
} from "../../ingestion/errors.js";
import { GitHubAuthenticationError, GitHubRateLimitError } from "../../repositories/errors.js";
import { IngestionCancelledError, SourceIngestionError } from "../../services/ingestion-errors.js";
import { QueryParseError, StorageError, StorageOpenError } from "../../storage/errors.js";

/** Exit status after Ctrl-C */
const EXIT_INTERRUPTED = 130;

/**
 * Every error in a `cause` chain, outermost first
 */
export function causeChain(error: unknown): unknown[] {
  const chain: unknown[] = [];
  let current: unknown = error;
  while (current !== undefined && current !== null && !chain.includes(current)) {
    chain.push(current);
    current = current instanceof Error ? current.cause : undefined;
  }
  return chain;
}

function nextSteps(steps: string[]): void {
  console.error("\n" + chalk.bold("Next steps:"));
  for (const step of steps) {
    console.error(`  • ${step}`);
  }
}

function sourceFailureSteps(error: SourceIngestionError): string[] {
  const chain = causeChain(error);
  const has = (type: abstract new (...args: never[]) => Error): boolean => chain.some((e) => e instanceof type);

  if (has(GitHubRateLimitError)) {
    return [
      "Wait for the GitHub rate limit to reset",
      "Authenticate to raise the limit: set " + chalk.cyan("GITHUB_TOKEN") + " or " + chalk.cyan("tokenFile"),
    ];
  }
  if (has(GitHubAuthenticationError)) {
    return [
      "Check that the GitHub token is valid and not expired",
      "Token sources: " + chalk.cyan("tokenFile") + " in the config, then " + chalk.cyan("GITHUB_TOKEN"),
    ];
  }
  if (has(AuthenticationError)) {
    return [
      "Verify the repository exists and you have access to it",
      "For ssh clone URLs, check that your ssh key is loaded",
      "For https clone URLs, set " + chalk.cyan("GITHUB_TOKEN"),
    ];
  }
  if (has(NetworkError) || has(RepositoryCloneError)) {
    return ["Check network connectivity and that git is installed", "Retry the index command"];
  }
  if (has(FileReadError) || has(FileScanError)) {
    return ["Check that the configured paths exist and are readable"];
  }
  return [
    "Enable verbose logging: " + chalk.gray(`LOG_LEVEL=debug docstream index --source ${error.sourceId}`),
  ];
}

/**
 * Handle command errors and exit with appropriate status code
 *
 * Displays a formatted error message and exits the process with code 1
 * (130 when indexing was interrupted).
 */
export function handleCommandError(error: unknown): never {
  console.error(); // Blank line for spacing

  if (error instanceof ConfigError) {
    console.error(chalk.red("✗ Configuration Error"));
    console.error(`\n${error.message}`);
    nextSteps([
      "Compare with " + chalk.gray("docstream.config.example.json"),
      "Pass the file explicitly: " + chalk.gray("docstream --config <path> <command>"),
    ]);
    process.exit(1);
  }

  if (error instanceof ZodError) {
    console.error(chalk.red("✗ Invalid Options"));
    for (const issue of error.issues) {
      console.error(`  • ${issue.path.length > 0 ? `${issue.path.join(".")}: ` : ""}${issue.message}`);
    }
    nextSteps(["See " + chalk.gray("docstream <command> --help")]);
    process.exit(1);
  }

  if (error instanceof IngestionCancelledError) {
    console.error(chalk.yellow("⚠ Indexing Cancelled"));
    console.error(`\n${error.message}`);
    console.error("Batches committed before the interruption remain searchable.");
    process.exit(EXIT_INTERRUPTED);
  }

  if (error instanceof SourceIngestionError) {
    console.error(chalk.red(`✗ Indexing Failed for Source '${error.sourceId}'`));
    console.error(`\n${error.message}`);
    if (error.retryable) {
      console.error("\n" + chalk.yellow("This error may be transient. You can try again."));
    }
    nextSteps(sourceFailureSteps(error));
    process.exit(1);
  }

  if (error instanceof QueryParseError) {
    console.error(chalk.red("✗ Invalid Search Query"));
    console.error(`\n${error.message}`);
    console.error("\n" + chalk.bold("Examples:"));
    console.error("  " + chalk.gray('docstream search "release notes"'));
    console.error("  " + chalk.gray('docstream search "title:handbook OR onboarding"'));
    process.exit(1);
  }

  if (error instanceof StorageOpenError) {
    console.error(chalk.red("✗ Cannot Open Search Index"));
    console.error(`\n${error.message}`);
    nextSteps(["Check " + chalk.cyan("engine.path") + " in the configuration and its permissions"]);
    process.exit(1);
  }

  if (error instanceof StorageError) {
    console.error(chalk.red("✗ Search Index Error"));
    console.error(`\n${error.message}`);
    if (error.retryable) {
      console.error("\n" + chalk.yellow("This error may be transient. You can try again."));
    }
    nextSteps(["Enable verbose logging: " + chalk.gray("LOG_LEVEL=debug docstream <command>")]);
    process.exit(1);
  }

  // Handle generic Error instances
  if (error instanceof Error) {
    console.error(chalk.red("✗ Error"));
    console.error(`\n${error.message}`);

    // Show stack trace in verbose mode
    if (process.env["LOG_LEVEL"] === "debug" || process.env["LOG_LEVEL"] === "trace") {
      console.error("\n" + chalk.gray(error.stack ?? "No stack trace available"));
    }

    nextSteps(["Enable verbose logging: " + chalk.gray("LOG_LEVEL=debug docstream <command>")]);
    process.exit(1);
  }

  console.error(chalk.red("✗ Unknown Error"));
  console.error(`\n${String(error)}`);
  nextSteps(["Enable verbose logging: " + chalk.gray("LOG_LEVEL=debug docstream <command>")]);
  process.exit(1);
}
