import { loadConfig, type AppConfig } from "./config";
import { createApp } from "./app";
import { startScheduledJobs } from "./jobs";
import { buildShelterSyncDeps, createShelterSyncRunner } from "./jobs/shelter-sync";

function start(config: AppConfig) {
  const syncDeps = buildShelterSyncDeps(config);
  const runner = createShelterSyncRunner(syncDeps, config.sync);

  const app = createApp({
    runner,
    shelterStore: syncDeps.shelterStore,
    syncStateStore: syncDeps.syncStateStore,
    slot: config.sync.slot,
    adminToken: config.server.adminToken,
  });

  if (!config.server.adminToken) {
    console.warn('[Startup] SYNC_ADMIN_TOKEN is not set; the sync API will refuse all requests.');
  }

  startScheduledJobs(runner, config.server);

  app.listen(config.server.port, "0.0.0.0", () => {
    console.log(`[Startup] serving on port ${config.server.port}`);
  });
}

start(loadConfig());
