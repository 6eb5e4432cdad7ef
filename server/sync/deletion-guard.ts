import type { ShelterStore } from "server/services/shelters/shelters.services";
import { chunk } from "server/utils/chunk";
import { errorMessage } from "./result";
import type { Snapshot } from "./types";

export interface DeletionThresholds {
  safeThreshold: number;
  minCoverage: number;
  deleteAfterResume: boolean;
}

export interface ScanTrust {
  completed: boolean;
  sourceHadErrors: boolean;
  resumed: boolean;
}

export type DeletionVerdict =
  | { proceed: true; active: number; minRequired: number; seen: number; orphanIds: string[] }
  | { proceed: false; active: number; minRequired: number; seen: number; reason: string };

export function minSeenRequired(active: number, thresholds: DeletionThresholds): number {
  return Math.max(thresholds.safeThreshold, Math.floor(active * thresholds.minCoverage));
}

/**
 * Decides whether local shelters missing from this pass may be soft-deleted.
 * A small observed set is read as a partial or failing upstream, not as real data loss.
 */
export function evaluateDeletion(
  snapshot: Snapshot,
  seen: ReadonlySet<string>,
  trust: ScanTrust,
  thresholds: DeletionThresholds
): DeletionVerdict {
  let active = 0;
  const orphanIds: string[] = [];
  for (const [externalId, entry] of snapshot) {
    if (entry.deleted) continue;
    active++;
    if (!seen.has(externalId)) orphanIds.push(entry.id);
  }

  const minRequired = minSeenRequired(active, thresholds);
  const base = { active, minRequired, seen: seen.size };

  if (!trust.completed) {
    return { ...base, proceed: false, reason: "scan did not complete successfully" };
  }
  if (trust.sourceHadErrors) {
    return { ...base, proceed: false, reason: "registry errors occurred during scan" };
  }
  if (trust.resumed && !thresholds.deleteAfterResume) {
    return { ...base, proceed: false, reason: "scan resumed from a saved cursor and did not cover the full registry" };
  }
  if (seen.size < minRequired) {
    return {
      ...base,
      proceed: false,
      reason: `too few records found (${seen.size} < ${minRequired}), possible registry issue`,
    };
  }

  return { ...base, proceed: true, orphanIds };
}

export interface DeletionResult {
  deleted: number;
  failedChunks: number;
}

/** Soft-deletes orphaned shelters by internal id, chunkSize ids per request. */
export async function applyDeletion(
  store: ShelterStore,
  orphanIds: readonly string[],
  deletedAt: Date,
  chunkSize: number
): Promise<DeletionResult> {
  const result: DeletionResult = { deleted: 0, failedChunks: 0 };
  if (orphanIds.length === 0) return result;

  console.log(`[DELETE] Marking ${orphanIds.length} records as deleted...`);
  for (const ids of chunk(orphanIds, chunkSize)) {
    try {
      await store.softDelete(ids, deletedAt);
      result.deleted += ids.length;
    } catch (error) {
      result.failedChunks++;
      console.error(`[DELETE] Soft delete of ${ids.length} records failed: ${errorMessage(error)}`);
    }
  }
  return result;
}
