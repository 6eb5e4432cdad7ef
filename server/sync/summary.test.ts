import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { createFileReporter, emptySummary, formatStepSummary } from "./summary";

const NOW = new Date("2026-03-01T03:00:00Z");

describe("formatStepSummary", () => {
  it("renders every field as a markdown list item", () => {
    const summary = { ...emptySummary(NOW), new: 4, deletionSkippedReason: "scan did not complete successfully" };
    const lines = formatStepSummary(summary).split("\n");

    expect(lines.slice(0, 3)).toEqual(["## Shelter Sync Summary", "", "- **new**: 4"]);
    expect(lines).toContain("- **deletionSkippedReason**: scan did not complete successfully");
    expect(lines).toContain('- **writes**: {"batches":0,"written":0,"writtenIndividually":0,"rescued":0,"lost":0}');
    expect(lines).toContain("- **timestamp**: 2026-03-01T03:00:00.000Z");
    expect(lines[lines.length - 1]).toBe("");
  });
});

describe("createFileReporter", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "shelter-sync-"));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  it("overwrites the JSON summary and appends the step summary", async () => {
    const summaryPath = join(dir, "summary.json");
    const stepSummaryPath = join(dir, "step.md");
    const reporter = createFileReporter({ summaryPath, stepSummaryPath });

    await reporter.write({ ...emptySummary(NOW), pages: 1 });
    await reporter.write({ ...emptySummary(NOW), pages: 2 });
    await reporter.writeStepSummary(emptySummary(NOW));
    await reporter.writeStepSummary(emptySummary(NOW));

    const written: unknown = JSON.parse(await readFile(summaryPath, "utf-8"));
    expect(written).toMatchObject({ pages: 2, completed: false, timestamp: "2026-03-01T03:00:00.000Z" });
    const step = await readFile(stepSummaryPath, "utf-8");
    expect(step.split("## Shelter Sync Summary")).toHaveLength(3);
  });

  it("is a no-op without configured paths", async () => {
    const reporter = createFileReporter({});
    await expect(reporter.write(emptySummary(NOW))).resolves.toBeUndefined();
    await expect(reporter.writeStepSummary(emptySummary(NOW))).resolves.toBeUndefined();
  });

  it("warns instead of failing when the file cannot be written", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const reporter = createFileReporter({ summaryPath: join(dir, "missing", "summary.json") });

    await expect(reporter.write(emptySummary(NOW))).resolves.toBeUndefined();
    expect(warn).toHaveBeenCalledTimes(1);
  });
});
