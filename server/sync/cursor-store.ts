import type { SyncStateStore } from "server/services/sync-state/sync-state.services";
import { errorMessage } from "./result";

export interface CursorStore {
  load(): Promise<string | null>;
  save(cursor: string | null): Promise<void>;
}

/**
 * Resume point for the registry scan, kept in a single sync_state slot.
 * Storage failures are logged and read as "no cursor"; they never reach the caller.
 */
export function createCursorStore(
  store: SyncStateStore,
  slot: string,
  clock: () => Date = () => new Date()
): CursorStore {
  return {
    async load() {
      try {
        const state = await store.read(slot);
        return state?.cursor || null;
      } catch (error) {
        console.warn(`[CURSOR] Failed to load cursor for ${slot}: ${errorMessage(error)}`);
        return null;
      }
    },

    async save(cursor) {
      try {
        await store.write(slot, cursor, clock());
      } catch (error) {
        console.warn(`[CURSOR] Failed to save cursor for ${slot}: ${errorMessage(error)}`);
      }
    },
  };
}
