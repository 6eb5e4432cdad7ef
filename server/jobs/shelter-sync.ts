import type { AppConfig, SyncConfig } from "server/config";
import { DrizzleShelterStore } from "server/services/shelters/shelters.services";
import { DrizzleSyncStateStore } from "server/services/sync-state/sync-state.services";
import { createDb } from "server/storage";
import { createAddressLookup } from "server/sync/address-lookup";
import { createBbrSource } from "server/sync/bbr-source";
import { syncShelters, type ShelterSyncDeps, type ShelterSyncOptions } from "server/sync/shelter-sync";
import { createFileReporter, type RunSummary } from "server/sync/summary";

export function buildShelterSyncDeps(config: AppConfig): ShelterSyncDeps {
  const db = createDb(config.databaseUrl);
  return {
    shelterStore: new DrizzleShelterStore(db),
    syncStateStore: new DrizzleSyncStateStore(db),
    source: createBbrSource({ url: config.source.url, apiKey: config.source.apiKey }),
    lookupAddress: createAddressLookup({ baseUrl: config.address.url }),
    reporter: createFileReporter(config.reporting),
  };
}

export interface ShelterSyncRunner {
  /** Resolves to null when a run is already in progress. */
  run(options?: ShelterSyncOptions): Promise<RunSummary | null>;
  readonly running: boolean;
  readonly lastSummary: RunSummary | null;
  readonly lastError: string | null;
}

/** Serializes runs within this process and remembers the last outcome for the ops API. */
export function createShelterSyncRunner(deps: ShelterSyncDeps, config: SyncConfig): ShelterSyncRunner {
  let running = false;
  let lastSummary: RunSummary | null = null;
  let lastError: string | null = null;

  return {
    get running() {
      return running;
    },
    get lastSummary() {
      return lastSummary;
    },
    get lastError() {
      return lastError;
    },

    async run(options) {
      if (running) {
        console.warn(`[SHELTER SYNC] A sync is already running, skipping`);
        return null;
      }
      running = true;
      const startTime = Date.now();
      try {
        lastSummary = await syncShelters(deps, config, options);
        lastError = null;
        const elapsed = Math.round((Date.now() - startTime) / 1000);
        console.log(`[SHELTER SYNC] Run finished in ${elapsed}s`);
        return lastSummary;
      } catch (error) {
        lastError = error instanceof Error ? error.message : String(error);
        throw error;
      } finally {
        running = false;
      }
    },
  };
}
