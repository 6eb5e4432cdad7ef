import { eq } from "drizzle-orm";
import { syncState } from "@database/schemas/sync.schema";
import type { InsertSyncState } from "@database/types/sync";
import type { Database } from "server/storage";

export interface SyncStateRecord {
  cursor: string | null;
  lastRunAt: Date | null;
}

export interface SyncStateStore {
  read(slot: string): Promise<SyncStateRecord | null>;
  write(slot: string, cursor: string | null, lastRunAt: Date): Promise<void>;
}

export class DrizzleSyncStateStore implements SyncStateStore {
  constructor(private readonly db: Database) {}

  async read(slot: string): Promise<SyncStateRecord | null> {
    const [row] = await this.db
      .select({ cursor: syncState.cursor, lastRunAt: syncState.lastRunAt })
      .from(syncState)
      .where(eq(syncState.slot, slot))
      .limit(1);
    return row ?? null;
  }

  async write(slot: string, cursor: string | null, lastRunAt: Date): Promise<void> {
    const values: InsertSyncState = { slot, cursor, lastRunAt };
    await this.db
      .insert(syncState)
      .values(values)
      .onConflictDoUpdate({
        target: syncState.slot,
        set: { cursor, lastRunAt, updatedAt: new Date() },
      });
  }
}
