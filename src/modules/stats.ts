/**
 * Stats Module
 * Displays the run summary, the dry-run change report and issues
 */

import chalk from "chalk";
import type { ConversionContext, Issue, PlannedChange, ProcessingStats } from "../types";

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

function progressBar(current: number, total: number, width: number = 24): string {
  if (total === 0) return chalk.dim("─".repeat(width));

  const percentage = current / total;
  const filled = Math.round(width * percentage);
  const empty = width - filled;
  const percentText = `${Math.round(percentage * 100)}%`;

  return `${chalk.green("━".repeat(filled))}${chalk.dim("━".repeat(empty))} ${chalk.dim(percentText)}`;
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

/**
 * One dry-run report line: `path:line: binding = expression`
 */
export function formatPlannedChange(change: PlannedChange): string {
  return `${change.path}:${change.line}: ${change.binding} = ${change.expression}`;
}

// ============================================================================
// Main Stats Display
// ============================================================================

/**
 * Export stats to JSON when asked and display them
 */
export async function stats(ctx: ConversionContext): Promise<void> {
  const { config, run, tracker } = ctx;
  if (run.statsPath) {
    await tracker.exportStats(run.statsPath);
  }

  // Standard output carries the converted text in simple mode
  if (run.simple) {
    return;
  }

  const summary = tracker.getStats();

  if (run.dryRun) {
    displayPlannedChanges(summary.plannedChanges);
  }

  if (config.quiet) {
    return;
  }

  const statusIcon = tracker.hasFailures()
    ? chalk.red("✖")
    : summary.issues.length > 0
      ? chalk.yellow("◆")
      : chalk.green("✔");
  const title = run.recover !== null ? "Recovery Complete" : run.dryRun ? "Dry Run Complete" : "Conversion Complete";

  console.log("");
  console.log(
    `  ${statusIcon} ${chalk.bold(title)} ${chalk.dim("·")} ${chalk.dim(formatDuration(summary.duration))}`,
  );

  if (run.recover !== null) {
    displayRecoverySection(summary);
  } else {
    displayFilesSection(summary, run.dryRun);
    if (ctx.archive && summary.archivedFiles > 0) {
      console.log(statRow(chalk.cyan("◉"), "Archive", ctx.archive.location, chalk.cyan));
    }
  }

  displayIssuesSection(summary.issues, run.verbose);
  console.log("");
}

// ============================================================================
// Section Displays
// ============================================================================

function displayPlannedChanges(changes: PlannedChange[]): void {
  const sorted = [...changes].sort(
    (a, b) => a.path.localeCompare(b.path) || a.line - b.line,
  );
  for (const change of sorted) {
    console.log(formatPlannedChange(change));
  }
}

function displayFilesSection(summary: ProcessingStats, dryRun: boolean): void {
  console.log(sectionHeader("Files"));

  const converted = summary.rewrittenFiles + summary.unchangedFiles;
  console.log(`   ${progressBar(converted, summary.totalFiles)}`);

  console.log(
    statRow(
      chalk.green("◉"),
      dryRun ? "Would rewrite" : "Rewritten",
      summary.rewrittenFiles,
      chalk.green,
    ),
  );
  console.log(statRow(chalk.dim("◉"), "Unchanged", summary.unchangedFiles, chalk.white));

  if (summary.failedFiles > 0) {
    console.log(statRow(chalk.red("◉"), "Failed", summary.failedFiles, chalk.red));
  }

  if (summary.bindings > 0) {
    console.log(statRow(chalk.cyan("◉"), "Bindings", summary.bindings, chalk.cyan));
  }
}

function displayRecoverySection(summary: ProcessingStats): void {
  console.log(sectionHeader("Records"));

  const total = summary.restoredRecords + summary.skippedRecords;
  console.log(`   ${progressBar(summary.restoredRecords, total)}`);
  console.log(statRow(chalk.green("◉"), "Restored", summary.restoredRecords, chalk.green));

  if (summary.skippedRecords > 0) {
    console.log(statRow(chalk.red("◉"), "Skipped", summary.skippedRecords, chalk.red));
  }
}

function displayIssuesSection(issues: Issue[], verbose: boolean): void {
  if (issues.length === 0) {
    return;
  }

  console.log(sectionHeader(chalk.red("Errors")));

  const byReason = new Map<string, Issue[]>();
  for (const issue of issues) {
    const group = byReason.get(issue.reason) ?? [];
    group.push(issue);
    byReason.set(issue.reason, group);
  }

  for (const [reason, group] of byReason) {
    console.log(statRow(chalk.red("✖"), reason, group.length, chalk.red));

    const shown = verbose ? group : group.slice(0, 5);
    for (const issue of shown) {
      console.log(`      ${chalk.dim("·")} ${issue.path}`);
      if (verbose) {
        console.log(`        ${chalk.dim(issue.details)}`);
      }
    }
    if (shown.length < group.length) {
      console.log(`      ${chalk.dim(`  +${group.length - shown.length} more`)}`);
    }
  }
}
