import type {
  CoreShelterWrite,
  FullShelterWrite,
  LookupCodes,
  ShelterStore,
} from "server/services/shelters/shelters.services";
import { errorMessage } from "./result";

export type QueuedWrite = { kind: "full"; row: FullShelterWrite } | { kind: "core"; row: CoreShelterWrite };

export interface WriteStats {
  batches: number;
  written: number;
  writtenIndividually: number;
  rescued: number;
  lost: number;
}

export function collectCodes(rows: readonly CoreShelterWrite[]): LookupCodes {
  const usageCodes = new Set<string>();
  const municipalityCodes = new Set<string>();
  for (const row of rows) {
    if (row.usageCode) usageCodes.add(row.usageCode);
    if (row.municipalityCode) municipalityCodes.add(row.municipalityCode);
  }
  return { usageCodes: [...usageCodes], municipalityCodes: [...municipalityCodes] };
}

/**
 * Buffers upserts in two queues (full rows with fresh enrichment, core-only rows)
 * and writes each queue when it reaches batchSize. A failed batch degrades to
 * per-record writes, then to a minimal rescue write per record.
 */
export class WriteBatcher {
  private fullQueue: FullShelterWrite[] = [];
  private coreQueue: CoreShelterWrite[] = [];
  readonly stats: WriteStats = { batches: 0, written: 0, writtenIndividually: 0, rescued: 0, lost: 0 };

  constructor(
    private readonly store: ShelterStore,
    private readonly batchSize: number
  ) {}

  get pending(): number {
    return this.fullQueue.length + this.coreQueue.length;
  }

  async add(write: QueuedWrite): Promise<void> {
    if (write.kind === "full") {
      this.fullQueue.push(write.row);
      if (this.fullQueue.length >= this.batchSize) await this.flushFull();
    } else {
      this.coreQueue.push(write.row);
      if (this.coreQueue.length >= this.batchSize) await this.flushCore();
    }
  }

  async flush(): Promise<void> {
    await this.flushFull();
    await this.flushCore();
  }

  private async flushFull(): Promise<void> {
    const batch = this.fullQueue;
    this.fullQueue = [];
    await this.writeBatch(batch, (rows) => this.store.upsertFull(rows));
  }

  private async flushCore(): Promise<void> {
    const batch = this.coreQueue;
    this.coreQueue = [];
    await this.writeBatch(batch, (rows) => this.store.upsertCore(rows));
  }

  private async writeBatch<T extends CoreShelterWrite>(batch: T[], upsert: (rows: T[]) => Promise<void>) {
    if (batch.length === 0) return;

    try {
      await this.store.registerCodes(collectCodes(batch));
    } catch (error) {
      console.warn(`[WRITE] Could not register lookup codes: ${errorMessage(error)}`);
    }

    try {
      await upsert(batch);
      this.stats.batches++;
      this.stats.written += batch.length;
      console.log(`[WRITE] Saved batch of ${batch.length} records`);
      return;
    } catch (error) {
      console.error(`[WRITE] Batch upsert of ${batch.length} records failed: ${errorMessage(error)}`);
      console.log(`[WRITE] Retrying batch one by one...`);
    }

    for (const row of batch) {
      try {
        await upsert([row]);
        this.stats.writtenIndividually++;
        this.stats.written++;
        continue;
      } catch (error) {
        console.warn(`[WRITE] Failed to upsert ${row.externalId}: ${errorMessage(error)}`);
      }

      try {
        console.log(`[WRITE]   Attempting minimal recovery for ${row.externalId}...`);
        await this.store.upsertRescue({
          externalId: row.externalId,
          capacity: row.capacity,
          lastChecked: row.lastChecked,
        });
        this.stats.rescued++;
        this.stats.written++;
        console.log(`[WRITE]   Minimal recovery saved ${row.externalId}`);
      } catch (error) {
        this.stats.lost++;
        console.error(`[WRITE]   Could not save ${row.externalId} even with minimal data: ${errorMessage(error)}`);
      }
    }
  }
}
