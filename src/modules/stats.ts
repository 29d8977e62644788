/**
 * Stats Module
 * Displays the batch summary and exports it as JSON
 */

import chalk from "chalk";
import { saveJson } from "../utils/save-json";
import type {
  BatchSummary,
  FailedOutcome,
  ScanDiagnostic,
  SkippedOutcome,
  UpdatedOutcome,
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
 * Display the batch summary on the console
 */
export function stats(summary: BatchSummary, verbose?: boolean): void {
  const hasErrors = summary.failedCount > 0;
  const hasWarnings =
    summary.cancelled ||
    summary.skippedCount > 0 ||
    summary.diagnostics.length > 0;

  console.log("");

  const statusIcon = hasErrors
    ? chalk.red("✖")
    : hasWarnings
      ? chalk.yellow("◆")
      : chalk.green("✔");
  const title = summary.cancelled ? "Update Cancelled" : "Update Complete";

  console.log(
    `  ${statusIcon} ${chalk.bold(title)} ${chalk.dim("·")} ${chalk.dim(`S${summary.targetSpeed}`)} ${chalk.dim("·")} ${chalk.dim(formatDuration(summary.duration))}`,
  );

  displayFilesSection(summary, verbose);
  displayIssuesSection(summary, verbose);

  console.log("");
}

// ============================================================================
// Section Displays
// ============================================================================

function displayFilesSection(summary: BatchSummary, verbose?: boolean): void {
  console.log(sectionHeader("Files"));

  const bar = progressBar(summary.updatedCount, summary.total);
  console.log(`   ${bar}`);

  console.log(
    statRow(chalk.green("◉"), "Updated", summary.updatedCount, chalk.green),
  );

  if (verbose) {
    const updated = summary.outcomes.filter(
      (o): o is UpdatedOutcome => o.status === "updated",
    );
    for (const outcome of updated) {
      console.log(
        `      ${chalk.dim("·")} ${outcome.relativePath} ${chalk.dim(`line ${outcome.line}: S${outcome.oldSpeed} → S${outcome.newSpeed}`)}`,
      );
    }
  }

  if (summary.skippedCount > 0) {
    console.log(
      statRow(
        chalk.yellow("◉"),
        "Skipped",
        summary.skippedCount,
        chalk.yellow,
      ),
    );
    if (verbose) {
      const skipped = summary.outcomes.filter(
        (o): o is SkippedOutcome => o.status === "skipped",
      );
      for (const outcome of skipped) {
        console.log(
          `      ${chalk.dim("·")} ${outcome.relativePath} ${chalk.dim(outcome.details)}`,
        );
      }
    }
  }

  if (summary.failedCount > 0) {
    console.log(
      statRow(chalk.red("◉"), "Failed", summary.failedCount, chalk.red),
    );
  }
}

function displayIssuesSection(summary: BatchSummary, verbose?: boolean): void {
  const failed = summary.outcomes.filter(
    (o): o is FailedOutcome => o.status === "failed",
  );
  const { diagnostics } = summary;

  if (failed.length === 0 && diagnostics.length === 0) {
    return;
  }

  console.log(sectionHeader(chalk.red("Errors")));

  // Failed files are always listed: the operator has to act on them
  for (const outcome of failed) {
    console.log(`      ${chalk.dim("·")} ${outcome.relativePath}`);
    console.log(`        ${chalk.dim(outcome.details)}`);
  }

  if (diagnostics.length > 0) {
    console.log(
      statRow(
        chalk.yellow("✖"),
        "Not scanned",
        diagnostics.length,
        chalk.yellow,
      ),
    );
    if (verbose) {
      displayDiagnostics(diagnostics);
    }
  }
}

function displayDiagnostics(diagnostics: ScanDiagnostic[]): void {
  for (const diagnostic of diagnostics.slice(0, 5)) {
    console.log(`      ${chalk.dim("·")} ${diagnostic.path}`);
  }
  if (diagnostics.length > 5) {
    console.log(`      ${chalk.dim(`  +${diagnostics.length - 5} more`)}`);
  }
}

// ============================================================================
// Export
// ============================================================================

/**
 * Write the summary to a JSON report
 */
export async function writeReport(
  summary: BatchSummary,
  filepath: string,
): Promise<void> {
  const { outcomes, diagnostics, ...counts } = summary;
  await saveJson(filepath, { summary: counts, outcomes, diagnostics });
}
