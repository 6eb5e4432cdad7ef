/**
 * Shelter Sync
 *
 * Reconciles the local shelters table with the BBR registry (buildings with status 6).
 * 1. Loads the resume cursor and a snapshot of every local shelter
 * 2. Walks registry pages, classifying each building against the snapshot
 * 3. Enriches new, restored and stale records with DAWA address data
 * 4. Upserts in batches and persists the cursor after every page
 * 5. After a complete, trustworthy pass, soft-deletes shelters missing upstream
 */

import type { SyncConfig } from "server/config";
import type { ShelterStore } from "server/services/shelters/shelters.services";
import type { SyncStateStore } from "server/services/sync-state/sync-state.services";
import { chunk } from "server/utils/chunk";
import type { Sleep } from "server/utils/delay";
import type { AddressLookup } from "./address-lookup";
import type { PageSource } from "./bbr-source";
import { createCursorStore } from "./cursor-store";
import { applyDeletion, evaluateDeletion } from "./deletion-guard";
import { errorMessage } from "./result";
import { ScanDriver, type ScanProgress } from "./scan-driver";
import { loadSnapshot } from "./snapshot";
import { emptySummary, type RunReporter, type RunSummary } from "./summary";
import { WriteBatcher } from "./write-batcher";

export interface ShelterSyncDeps {
  shelterStore: ShelterStore;
  syncStateStore: SyncStateStore;
  source: PageSource;
  lookupAddress: AddressLookup;
  reporter: RunReporter;
  clock?: () => Date;
  sleep?: Sleep;
  random?: () => number;
}

export interface ShelterSyncOptions {
  signal?: AbortSignal;
}

function applyProgress(summary: RunSummary, progress: ScanProgress) {
  Object.assign(summary, progress.counters);
  summary.pages = progress.pages;
  summary.seenIds = progress.seenIds;
  summary.retries = progress.retries;
}

async function touchUnchanged(
  store: ShelterStore,
  externalIds: readonly string[],
  seenAt: Date,
  chunkSize: number
): Promise<void> {
  for (const ids of chunk(externalIds, chunkSize)) {
    try {
      await store.touchLastSeen(ids, seenAt);
    } catch (error) {
      console.error(`[SHELTER SYNC] Failed to update last_seen_at for ${ids.length} records: ${errorMessage(error)}`);
    }
  }
}

/**
 * Runs one reconciliation pass. Throws SnapshotLoadError when the local baseline
 * cannot be read; every other failure is absorbed and reported in the summary.
 */
export async function syncShelters(
  deps: ShelterSyncDeps,
  config: SyncConfig,
  options: ShelterSyncOptions = {}
): Promise<RunSummary> {
  const clock = deps.clock ?? (() => new Date());
  const runAt = clock();
  const { shelterStore, reporter } = deps;

  console.log(`[SHELTER SYNC] Starting registry sync...`);

  const cursorStore = createCursorStore(deps.syncStateStore, config.slot, clock);
  const startCursor = await cursorStore.load();

  const snapshot = await loadSnapshot(shelterStore, {
    pageSize: config.snapshotPageSize,
    attempts: config.snapshotAttempts,
    backoffMs: config.snapshotBackoffMs,
    sleep: deps.sleep,
  });

  const summary = emptySummary(runAt);
  summary.resumed = startCursor !== null;
  await reporter.write(summary);

  const batcher = new WriteBatcher(shelterStore, config.batchSize);
  const driver = new ScanDriver({
    source: deps.source,
    cursorStore,
    snapshot,
    lookupAddress: deps.lookupAddress,
    batcher,
    config,
    runAt,
    startCursor,
    sleep: deps.sleep,
    random: deps.random,
    signal: options.signal,
    onPage: async (progress) => {
      applyProgress(summary, progress);
      summary.writes = { ...batcher.stats };
      summary.timestamp = clock().toISOString();
      await reporter.write(summary);
    },
  });

  const outcome = await driver.run();
  await batcher.flush();
  // A partial pass must not refresh last_seen_at for rows it never compared
  if (outcome.completed && outcome.sourceErrorCount === 0) {
    await touchUnchanged(shelterStore, outcome.unchangedIds, runAt, config.patchChunkSize);
  }

  applyProgress(summary, outcome);
  summary.completed = outcome.completed;
  summary.sourceErrorCount = outcome.sourceErrorCount;
  summary.sourceHadErrors = outcome.sourceErrorCount > 0;
  summary.interrupted = outcome.status === "interrupted";

  const verdict = evaluateDeletion(
    snapshot,
    outcome.seen,
    { completed: outcome.completed, sourceHadErrors: summary.sourceHadErrors, resumed: summary.resumed },
    config
  );
  summary.activeExisting = verdict.active;
  summary.minSeenRequired = verdict.minRequired;

  if (verdict.proceed) {
    console.log(`[SHELTER SYNC] Processing deletions...`);
    const deletion = await applyDeletion(shelterStore, verdict.orphanIds, runAt, config.patchChunkSize);
    summary.deleted = deletion.deleted;
  } else {
    summary.deletionSkippedReason = verdict.reason;
    console.warn(`[SHELTER SYNC] Skipping deletion phase: ${verdict.reason}`);
  }

  summary.writes = { ...batcher.stats };
  summary.timestamp = clock().toISOString();

  console.log(
    `[SHELTER SYNC] Summary: New: ${summary.new}, Updated: ${summary.updated}, Restored: ${summary.restored}, ` +
      `Deleted: ${summary.deleted}, Address Refreshed: ${summary.addressRefreshed}, ` +
      `Missing Location: ${summary.missingLocation}, Unchanged: ${summary.unchanged}`
  );

  await reporter.write(summary);
  await reporter.writeStepSummary(summary);
  return summary;
}
