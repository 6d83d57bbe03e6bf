/**
 * Build Tracker
 * Unified tracking for task outcomes and issues
 */

import { writeFile, mkdir } from "fs/promises";
import { join } from "path";
import type { ConversionResult, BuildSummary, ResultStatus } from "../types/pipeline";
import { CommandError, UnknownFormatError, ErrorCodes } from "./errors";
import type { ConversionError } from "./errors";

// ============================================================================
// Issue types
// ============================================================================

export type TaskIssueReason =
  | "unknown-format"
  | "missing-dependencies"
  | "timeout"
  | "tool-failed"
  | "no-output"
  | "conversion-error";

export interface TaskIssue {
  task: string; // "{language}/{flavor}/{format}"
  format: string;
  reason: TaskIssueReason;
  details: string;
  diagnostics?: string;
}

export interface BuildStats extends BuildSummary {
  attempts: number;
  retried: number;
  artifacts: string[];
  issues: TaskIssue[];
  duration: number;
}

// ============================================================================
// Error Mapping (private)
// ============================================================================

function mapTaskError(error: ConversionError): TaskIssueReason {
  if (error instanceof UnknownFormatError) return "unknown-format";
  if (error.code === ErrorCodes.MISSING_DEPENDENCIES) return "missing-dependencies";
  if (error.code === ErrorCodes.TIMEOUT) return "timeout";
  if (error.cause instanceof CommandError) return "tool-failed";
  if (error.message.startsWith("No output produced")) return "no-output";
  return "conversion-error";
}

// ============================================================================
// Tracker Class
// ============================================================================

export class BuildTracker {
  private totalTasks = 0;
  private counts: Record<ResultStatus, number> = { success: 0, failure: 0, skipped: 0 };
  private attempts = 0;
  private retried = 0;
  private artifacts: string[] = [];
  private issues: TaskIssue[] = [];
  private results: ConversionResult[] = [];
  private startTime = new Date();

  setTotalTasks(count: number): void {
    this.totalTasks = count;
  }

  record(result: ConversionResult): void {
    this.results.push(result);
    this.counts[result.status]++;

    switch (result.status) {
      case "success": {
        this.attempts += result.attempts;
        if (result.attempts > 1) this.retried++;
        this.artifacts.push(result.artifact);
        break;
      }
      case "failure": {
        this.attempts += result.attempts;
        if (result.attempts > 1) this.retried++;
        this.issues.push({
          task: result.task.id,
          format: result.task.format,
          reason: mapTaskError(result.error),
          details: result.error.message,
          diagnostics: result.error.diagnostics,
        });
        break;
      }
      case "skipped":
        break;
    }
  }

  getIssues(reason?: TaskIssueReason): TaskIssue[] {
    if (!reason) return this.issues;
    return this.issues.filter((i) => i.reason === reason);
  }

  getSummary(): BuildSummary {
    return {
      total: this.totalTasks,
      succeeded: this.counts.success,
      failed: this.counts.failure,
      skipped: this.counts.skipped,
    };
  }

  getStats(): BuildStats {
    const duration = new Date().getTime() - this.startTime.getTime();

    return {
      ...this.getSummary(),
      attempts: this.attempts,
      retried: this.retried,
      artifacts: this.artifacts,
      issues: this.issues,
      duration,
    };
  }

  // ============================================================================
  // Export
  // ============================================================================

  async exportSummary(outputDir: string): Promise<string> {
    const stats = this.getStats();

    const exported = {
      summary: {
        total: stats.total,
        succeeded: stats.succeeded,
        failed: stats.failed,
        skipped: stats.skipped,
        attempts: stats.attempts,
        retried: stats.retried,
        duration: stats.duration,
      },
      tasks: this.results.map((result) => ({
        task: result.task.id,
        status: result.status,
        artifact: result.status === "success" ? result.artifact : undefined,
        attempts: result.status === "skipped" ? 0 : result.attempts,
      })),
      failures: this.groupIssuesByFormat(),
    };

    await mkdir(outputDir, { recursive: true });
    const outputPath = join(outputDir, "build-summary.json");
    await writeFile(outputPath, JSON.stringify(exported, null, 2), "utf-8");
    return outputPath;
  }

  private groupIssuesByFormat(): Record<string, TaskIssue[]> {
    const grouped: Record<string, TaskIssue[]> = {};
    for (const issue of this.issues) {
      if (!grouped[issue.format]) {
        grouped[issue.format] = [];
      }
      grouped[issue.format].push(issue);
    }
    return grouped;
  }
}
