import { parseCapacity } from "server/utils/parseCapacity";
import type { Snapshot, SnapshotEntry, ShelterDecision, UpstreamRecord } from "./types";

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * True when enrichment is older than the refresh horizon, measured in whole days.
 * Prefers last_address_checked, falls back to last_checked; no timestamp at all is stale.
 */
export function isAddressStale(
  entry: Pick<SnapshotEntry, "lastAddressChecked" | "lastChecked">,
  now: Date,
  refreshDays: number
): boolean {
  const checkedAt = entry.lastAddressChecked ?? entry.lastChecked;
  if (!checkedAt || Number.isNaN(checkedAt.getTime())) return true;
  const daysSince = Math.floor((now.getTime() - checkedAt.getTime()) / DAY_MS);
  return daysSince > refreshDays;
}

/**
 * Diffs one registry record against the snapshot.
 * Returns null when the record is not a shelter (capacity missing, non-numeric or <= 0).
 */
export function classifyRecord(
  record: UpstreamRecord,
  snapshot: Snapshot,
  now: Date,
  refreshDays: number
): ShelterDecision | null {
  const capacity = parseCapacity(record.capacity);
  if (capacity === null || capacity <= 0) return null;

  const base = {
    externalId: record.externalId,
    capacity,
    usageCode: record.usageCode,
    municipalityCode: record.municipalityCode,
    addressPointId: record.addressPointId,
  };

  const current = snapshot.get(record.externalId);

  if (!current) {
    return { ...base, classification: "new", needsEnrichment: true, clearDeleted: false };
  }

  if (current.deleted) {
    return { ...base, classification: "restored", needsEnrichment: true, clearDeleted: true };
  }

  if (
    current.capacity !== capacity ||
    current.usageCode !== record.usageCode ||
    current.municipalityCode !== record.municipalityCode
  ) {
    return { ...base, classification: "updated", needsEnrichment: false, clearDeleted: false };
  }

  if (!current.hasLocation || isAddressStale(current, now, refreshDays)) {
    return {
      ...base,
      classification: "address_refresh",
      needsEnrichment: true,
      clearDeleted: false,
      refreshReason: current.hasLocation ? "stale" : "missing_location",
    };
  }

  return { ...base, classification: "unchanged", needsEnrichment: false, clearDeleted: false };
}
