import type { ShelterStore, SnapshotRow } from "server/services/shelters/shelters.services";
import { delay, type Sleep } from "server/utils/delay";
import { errorMessage } from "./result";
import type { Snapshot, SnapshotEntry } from "./types";

export class SnapshotLoadError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "SnapshotLoadError";
  }
}

export interface SnapshotLoaderOptions {
  pageSize: number;
  attempts: number;
  backoffMs: number;
  sleep?: Sleep;
}

function toEntry(row: SnapshotRow): SnapshotEntry {
  return {
    id: row.id,
    capacity: row.capacity,
    deleted: row.deleted !== null,
    lastChecked: row.lastChecked,
    lastAddressChecked: row.lastAddressChecked,
    hasLocation: row.hasLocation,
    usageCode: row.usageCode,
    municipalityCode: row.municipalityCode,
  };
}

/**
 * Loads every local shelter into memory, page by page.
 * Throws SnapshotLoadError when a page cannot be read: enrichment and deletion
 * decisions need the complete baseline.
 */
export async function loadSnapshot(store: ShelterStore, options: SnapshotLoaderOptions): Promise<Snapshot> {
  const { pageSize, attempts, backoffMs, sleep = delay } = options;
  const snapshot = new Map<string, SnapshotEntry>();
  let offset = 0;

  console.log(`[SNAPSHOT] Fetching existing shelter state...`);

  while (true) {
    let page: SnapshotRow[] | null = null;

    for (let attempt = 1; attempt <= attempts; attempt++) {
      try {
        page = await store.loadSnapshotPage(offset, pageSize);
        break;
      } catch (error) {
        if (attempt === attempts) {
          console.error(`[SNAPSHOT] Error fetching state at offset ${offset}: ${errorMessage(error)}`);
          throw new SnapshotLoadError(`Could not load shelter snapshot at offset ${offset}`, error);
        }
        console.warn(`[SNAPSHOT] Fetch failed at offset ${offset} (attempt ${attempt}/${attempts}), retrying`);
        await sleep(backoffMs * attempt);
      }
    }

    if (!page || page.length === 0) break;

    for (const row of page) {
      if (row.externalId) {
        snapshot.set(row.externalId, toEntry(row));
      }
    }

    if (page.length < pageSize) break;
    offset += pageSize;
  }

  console.log(`[SNAPSHOT] Total loaded: ${snapshot.size} records`);
  return snapshot;
}
