/**
 * Stats Module
 * Displays processing statistics and issues
 */

import chalk from "chalk";
import type { ConversionContext, ProcessingStats, Tracker } from "../types";

// ============================================================================
// Formatting Helpers
// ============================================================================

/**
 * Format duration in a human-readable way
 */
function formatElapsed(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  const seconds = ms / 1000;
  if (seconds < 60) {
    return `${seconds.toFixed(2)}s`;
  }
  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = (seconds % 60).toFixed(0);
  return `${minutes}m ${remainingSeconds}s`;
}

function statRow(
  icon: string,
  label: string,
  value: string | number,
  color: (s: string) => string = chalk.white,
): string {
  return `   ${icon} ${chalk.dim(label.padEnd(18))} ${color(String(value))}`;
}

function sectionHeader(title: string): string {
  return `\n  ${chalk.bold.white(title)}`;
}

// ============================================================================
// Main Stats Display
// ============================================================================

/**
 * Display processing statistics to console
 */
export async function stats(ctx: ConversionContext): Promise<void> {
  const { tracker, verbose, dryRun } = ctx;
  const stats = tracker.getStats();
  const hasWarnings = tracker.getIssues("warning").length > 0;
  const hasErrors = stats.failedFiles > 0;

  console.log("");

  const statusIcon = hasErrors
    ? chalk.red("✖")
    : hasWarnings
      ? chalk.yellow("◆")
      : chalk.green("✔");
  const title = dryRun ? "Dry Run Complete" : "Conversion Complete";

  console.log(
    `  ${statusIcon} ${chalk.bold(title)} ${chalk.dim("·")} ${chalk.dim(formatElapsed(stats.duration))}`,
  );

  displayFilesSection(stats);
  displayChangesSection(stats);
  displayIssuesSection(tracker, verbose);

  console.log("");
}

// ============================================================================
// Section Displays
// ============================================================================

function displayFilesSection(stats: ProcessingStats): void {
  console.log(sectionHeader("Files"));

  console.log(
    statRow(chalk.green("◉"), "Converted", stats.convertedFiles, chalk.green),
  );

  if (stats.unchangedFiles > 0) {
    console.log(
      statRow(chalk.cyan("◉"), "Unchanged", stats.unchangedFiles, chalk.cyan),
    );
  }

  if (stats.failedFiles > 0) {
    console.log(
      statRow(chalk.red("◉"), "Failed", stats.failedFiles, chalk.red),
    );
  }
}

function displayChangesSection(stats: ProcessingStats): void {
  if (stats.injectedCalls === 0 && stats.synthesizedMetadata === 0) {
    return;
  }

  console.log(sectionHeader("Changes"));

  if (stats.injectedCalls > 0) {
    console.log(
      statRow(chalk.green("◉"), "Detector calls", stats.injectedCalls),
    );
  }

  if (stats.synthesizedMetadata > 0) {
    console.log(
      statRow(chalk.green("◉"), "Metadata rebuilt", stats.synthesizedMetadata),
    );
  }
}

function displayIssuesSection(tracker: Tracker, verbose?: boolean): void {
  const fileIssues = tracker.getIssues("file");
  const conversionIssues = tracker.getIssues("conversion");
  const resourceIssues = tracker.getIssues("resource");
  const warnings = tracker.getIssues("warning");

  if (warnings.length > 0) {
    console.log(sectionHeader(chalk.yellow("Warnings")));
    console.log(
      statRow(chalk.yellow("◆"), "Metadata values", warnings.length, chalk.yellow),
    );
    if (verbose) {
      for (const warning of warnings.slice(0, 10)) {
        console.log(
          `      ${chalk.dim("·")} ${warning.path}:${warning.line} ${chalk.dim(warning.text)}`,
        );
      }
      if (warnings.length > 10) {
        console.log(`      ${chalk.dim(`  +${warnings.length - 10} more`)}`);
      }
    }
  }

  if (
    fileIssues.length === 0 &&
    conversionIssues.length === 0 &&
    resourceIssues.length === 0
  ) {
    return;
  }

  console.log(sectionHeader(chalk.red("Errors")));

  // Conversion issues are always listed: they explain why a file was left alone
  if (conversionIssues.length > 0) {
    console.log(
      statRow(chalk.red("✖"), "Not converted", conversionIssues.length, chalk.red),
    );
    for (const issue of conversionIssues) {
      console.log(`      ${chalk.dim("·")} ${issue.path} ${chalk.dim(`(${issue.reason})`)}`);
      if (issue.details) {
        console.log(`        ${chalk.dim(issue.details)}`);
      }
    }
  }

  if (fileIssues.length > 0) {
    console.log(
      statRow(chalk.red("✖"), "File errors", fileIssues.length, chalk.red),
    );
    if (verbose) {
      for (const issue of fileIssues) {
        console.log(`      ${chalk.dim("·")} ${issue.path} ${chalk.dim(`(${issue.reason})`)}`);
        if (issue.details) {
          console.log(`        ${chalk.dim(issue.details)}`);
        }
      }
    }
  }

  if (resourceIssues.length > 0) {
    console.log(
      statRow(
        chalk.yellow("✖"),
        "Config failed",
        resourceIssues.length,
        chalk.yellow,
      ),
    );
    if (verbose) {
      for (const issue of resourceIssues) {
        console.log(`      ${chalk.dim("·")} ${issue.path}`);
        if (issue.details) {
          console.log(`        ${chalk.dim(issue.details)}`);
        }
      }
    }
  }
}
