/**
 * Stats Module
 * Displays build statistics
 */

import chalk from "chalk";
import type { BuildStats, TaskIssue } from "../utils";
import type { BuildContext, BuildSummary } from "../types";

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
 * "{succeeded}/{total} succeeded"
 */
export function summaryLine(summary: BuildSummary): string {
  return `${summary.succeeded}/${summary.total} succeeded`;
}

function progressBar(current: number, total: number, width: number = 24): string {
  if (total === 0) return chalk.dim("─".repeat(width));

  const percentage = current / total;
  const filled = Math.round(width * percentage);
  const percentText = `${Math.round(percentage * 100)}%`;

  return `${chalk.green("━".repeat(filled))}${chalk.dim("━".repeat(width - filled))} ${chalk.dim(percentText)}`;
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
 * Display the run statistics
 */
export function stats(ctx: BuildContext, summaryPath?: string): BuildStats {
  const { tracker, verbose } = ctx;
  const stats = tracker.getStats();
  const statusIcon =
    stats.failed > 0 ? chalk.red("✖") : stats.skipped > 0 ? chalk.yellow("◆") : chalk.green("✔");

  console.log("");
  console.log(
    `  ${statusIcon} ${chalk.bold("Build Complete")} ${chalk.dim("·")} ${summaryLine(stats)} ${chalk.dim("·")} ${chalk.dim(formatDuration(stats.duration))}`,
  );

  displayTasksSection(stats);
  displayFormatsSection(ctx);
  displayIssuesSection(stats.issues, verbose);

  if (summaryPath) {
    console.log(`\n   ${chalk.dim(`Summary written to ${summaryPath}`)}`);
  }
  console.log("");

  return stats;
}

// ============================================================================
// Section Displays
// ============================================================================

function displayTasksSection(stats: BuildStats): void {
  console.log(sectionHeader("Tasks"));
  console.log(`   ${progressBar(stats.succeeded, stats.total)}`);

  console.log(statRow(chalk.green("◉"), "Succeeded", stats.succeeded, chalk.green));

  if (stats.failed > 0) {
    console.log(statRow(chalk.red("◉"), "Failed", stats.failed, chalk.red));
  }

  if (stats.skipped > 0) {
    console.log(statRow(chalk.yellow("◉"), "Skipped", stats.skipped, chalk.yellow));
  }

  if (stats.retried > 0) {
    console.log(statRow(chalk.cyan("◉"), "Retried", stats.retried, chalk.cyan));
  }
}

function displayFormatsSection(ctx: BuildContext): void {
  const results = ctx.results ?? [];
  if (results.length === 0) return;

  const rows = new Map<string, { succeeded: number; total: number }>();
  for (const result of results) {
    const row = rows.get(result.task.format) ?? { succeeded: 0, total: 0 };
    row.total++;
    if (result.status === "success") row.succeeded++;
    rows.set(result.task.format, row);
  }

  console.log(sectionHeader("Formats"));
  for (const [format, row] of rows) {
    const ok = row.succeeded === row.total;
    console.log(
      statRow(
        ok ? chalk.green("◉") : chalk.red("◉"),
        format,
        `${row.succeeded}/${row.total}`,
        ok ? chalk.green : chalk.red,
      ),
    );
  }
}

function displayIssuesSection(issues: TaskIssue[], verbose?: boolean): void {
  if (issues.length === 0) {
    return;
  }

  console.log(sectionHeader(chalk.red("Errors")));
  console.log(statRow(chalk.red("✖"), "Tasks failed", issues.length, chalk.red));

  if (!verbose) {
    return;
  }

  for (const issue of issues) {
    console.log(`      ${chalk.dim("·")} ${issue.task} ${chalk.dim(`(${issue.reason})`)}`);
    console.log(`        ${chalk.dim(issue.details)}`);
    if (issue.diagnostics) {
      for (const line of issue.diagnostics.split("\n").slice(0, 10)) {
        console.log(`        ${chalk.dim(line)}`);
      }
    }
  }
}
