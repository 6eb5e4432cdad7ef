import { Router } from "express";
import type { ShelterSyncRunner } from "server/jobs/shelter-sync";
import { requireSyncToken } from "server/middleware/requireSyncToken";
import type { ShelterStore } from "server/services/shelters/shelters.services";
import type { SyncStateStore } from "server/services/sync-state/sync-state.services";

export interface SyncRouteDeps {
  runner: ShelterSyncRunner;
  shelterStore: ShelterStore;
  syncStateStore: SyncStateStore;
  slot: string;
  adminToken?: string;
}

export function createSyncRouter(deps: SyncRouteDeps) {
  const router = Router();
  router.use(requireSyncToken(deps.adminToken));

  /* Cursor, last run and in-process summary */
  router.get("/status", async (_req, res) => {
    try {
      const [state, activeShelters] = await Promise.all([
        deps.syncStateStore.read(deps.slot),
        deps.shelterStore.countActive(),
      ]);

      res.status(200).json({
        slot: deps.slot,
        cursor: state?.cursor ?? null,
        lastRunAt: state?.lastRunAt ?? null,
        activeShelters,
        running: deps.runner.running,
        lastSummary: deps.runner.lastSummary,
        lastError: deps.runner.lastError,
      });
    } catch (error) {
      console.error("[SYNC API] Error reading sync status:", error);
      res.status(500).json({ message: "Error reading sync status" });
    }
  });

  /* Start a run in the background */
  router.post("/run", (_req, res) => {
    if (deps.runner.running) {
      res.status(409).json({ message: "A sync is already running" });
      return;
    }

    deps.runner.run().catch((error: unknown) => {
      console.error("[SYNC API] Background sync failed:", error);
    });

    res.status(202).json({ message: "Sync started" });
  });

  return router;
}
