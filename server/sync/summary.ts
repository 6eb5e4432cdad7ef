import { appendFile, writeFile } from "node:fs/promises";
import { errorMessage } from "./result";
import type { ScanCounters } from "./scan-driver";
import type { WriteStats } from "./write-batcher";

export interface RunSummary extends ScanCounters {
  deleted: number;
  pages: number;
  seenIds: number;
  activeExisting: number;
  minSeenRequired: number;
  sourceErrorCount: number;
  retries: number;
  completed: boolean;
  sourceHadErrors: boolean;
  resumed: boolean;
  interrupted: boolean;
  deletionSkippedReason: string | null;
  writes: WriteStats;
  timestamp: string;
}

export function emptySummary(now: Date): RunSummary {
  return {
    new: 0,
    updated: 0,
    restored: 0,
    unchanged: 0,
    addressRefreshed: 0,
    missingLocation: 0,
    discarded: 0,
    deleted: 0,
    pages: 0,
    seenIds: 0,
    activeExisting: 0,
    minSeenRequired: 0,
    sourceErrorCount: 0,
    retries: 0,
    completed: false,
    sourceHadErrors: false,
    resumed: false,
    interrupted: false,
    deletionSkippedReason: null,
    writes: { batches: 0, written: 0, writtenIndividually: 0, rescued: 0, lost: 0 },
    timestamp: now.toISOString(),
  };
}

export function formatStepSummary(summary: RunSummary): string {
  const lines = ["## Shelter Sync Summary", ""];
  for (const [key, value] of Object.entries(summary)) {
    const rendered = value !== null && typeof value === "object" ? JSON.stringify(value) : String(value);
    lines.push(`- **${key}**: ${rendered}`);
  }
  return lines.join("\n") + "\n";
}

export interface RunReporter {
  /** Overwrites the machine-readable summary with the latest counters. */
  write(summary: RunSummary): Promise<void>;
  /** Appends the final summary to the CI job summary, where one is configured. */
  writeStepSummary(summary: RunSummary): Promise<void>;
}

export function createFileReporter(paths: { summaryPath?: string; stepSummaryPath?: string }): RunReporter {
  return {
    async write(summary) {
      if (!paths.summaryPath) return;
      try {
        await writeFile(paths.summaryPath, JSON.stringify(summary, null, 2), "utf-8");
      } catch (error) {
        console.warn(`[SHELTER SYNC] Failed to write summary file: ${errorMessage(error)}`);
      }
    },

    async writeStepSummary(summary) {
      if (!paths.stepSummaryPath) return;
      try {
        await appendFile(paths.stepSummaryPath, formatStepSummary(summary), "utf-8");
      } catch (error) {
        console.warn(`[SHELTER SYNC] Failed to write step summary: ${errorMessage(error)}`);
      }
    },
  };
}
