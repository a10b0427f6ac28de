/**
 * Stats Module
 * Displays build statistics and issues
 */

import chalk from "chalk";
import type {
  ConversionContext,
  FileIssue,
  ProcessingStats,
  ResourceIssue,
} from "../types";

// ============================================================================
// Formatting Helpers
// ============================================================================

/**
 * Format duration in a human-readable way
 */
export function formatDuration(ms: number): string {
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

/**
 * Create a progress bar with percentage
 */
function progressBar(
  current: number,
  total: number,
  width: number = 24,
): string {
  if (total === 0) return chalk.dim("─".repeat(width));

  const percentage = current / total;
  const filled = Math.round(width * percentage);
  const empty = width - filled;
  const percentText = `${Math.round(percentage * 100)}%`;

  const filledBar = chalk.green("━".repeat(filled));
  const emptyBar = chalk.dim("━".repeat(empty));

  return `${filledBar}${emptyBar} ${chalk.dim(percentText)}`;
}

/**
 * Format a stat row with icon, label and value
 */
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
 * Display build statistics to console
 */
export async function stats(ctx: ConversionContext): Promise<void> {
  const { tracker, verbose, dryRun } = ctx;
  const stats = tracker.getStats();
  const fileIssues = tracker.getIssues("file");
  const failures = fileIssues.filter((i) => i.reason !== "output-conflict");
  const conflicts = fileIssues.filter((i) => i.reason === "output-conflict");
  const hasErrors = stats.failedFiles > 0;
  const hasWarnings =
    conflicts.length > 0 || tracker.getIssues("resource").length > 0;

  console.log("");

  const statusIcon = hasErrors
    ? chalk.red("✖")
    : hasWarnings
      ? chalk.yellow("◆")
      : chalk.green("✔");
  const title = dryRun ? "Dry Run Complete" : "Build Complete";

  console.log(
    `  ${statusIcon} ${chalk.bold(title)} ${chalk.dim("·")} ${chalk.dim(formatDuration(stats.duration))}`,
  );

  displayPagesSection(stats);
  displayAssetsSection(stats);
  displayIssuesSection(failures, tracker.getIssues("resource"), verbose);
  displayConflictsSection(conflicts);

  console.log("");
}

// ============================================================================
// Section Displays
// ============================================================================

function displayPagesSection(stats: ProcessingStats): void {
  console.log(sectionHeader("Pages"));

  const bar = progressBar(stats.renderedPages, stats.totalPages);
  console.log(`   ${bar}`);

  console.log(
    statRow(chalk.green("◉"), "Rendered", stats.renderedPages, chalk.green),
  );

  const failedPages = stats.totalPages - stats.renderedPages;
  if (failedPages > 0) {
    console.log(statRow(chalk.red("◉"), "Failed", failedPages, chalk.red));
  }
}

function displayAssetsSection(stats: ProcessingStats): void {
  if (stats.totalAssets === 0 && stats.copiedTemplateAssets === 0) {
    return;
  }

  console.log(sectionHeader("Assets"));

  if (stats.totalAssets > 0) {
    console.log(
      statRow(chalk.green("◉"), "Copied", stats.copiedAssets, chalk.green),
    );
  }

  if (stats.copiedTemplateAssets > 0) {
    console.log(
      statRow(
        chalk.cyan("◉"),
        "Template assets",
        stats.copiedTemplateAssets,
        chalk.cyan,
      ),
    );
  }
}

function displayIssuesSection(
  fileIssues: FileIssue[],
  resourceIssues: ResourceIssue[],
  verbose?: boolean,
): void {
  if (fileIssues.length === 0 && resourceIssues.length === 0) {
    return;
  }

  console.log(sectionHeader(chalk.red("Errors")));

  if (fileIssues.length > 0) {
    console.log(
      statRow(chalk.red("✖"), "Files failed", fileIssues.length, chalk.red),
    );
    for (const issue of fileIssues) {
      console.log(
        `      ${chalk.dim("·")} ${issue.path} ${chalk.dim(`(${issue.reason})`)}`,
      );
      if (verbose && issue.details) {
        console.log(`        ${chalk.dim(issue.details)}`);
      }
    }
  }

  if (resourceIssues.length > 0) {
    console.log(
      statRow(
        chalk.yellow("✖"),
        "Configs skipped",
        resourceIssues.length,
        chalk.yellow,
      ),
    );
    for (const issue of resourceIssues) {
      console.log(`      ${chalk.dim("·")} ${issue.path}`);
      if (verbose && issue.details) {
        console.log(`        ${chalk.dim(issue.details)}`);
      }
    }
  }
}

function displayConflictsSection(conflicts: FileIssue[]): void {
  if (conflicts.length === 0) return;

  console.log(sectionHeader(chalk.yellow("Warnings")));
  console.log(
    statRow(chalk.yellow("◆"), "Overwritten", conflicts.length, chalk.yellow),
  );
  for (const issue of conflicts) {
    console.log(
      `      ${chalk.dim("·")} ${issue.path} ${chalk.dim(`(${issue.details ?? issue.reason})`)}`,
    );
  }
}
