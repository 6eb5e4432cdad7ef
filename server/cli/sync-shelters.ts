import { ConfigError, loadConfig, type AppConfig } from "server/config";
import { buildShelterSyncDeps } from "server/jobs/shelter-sync";
import { syncShelters } from "server/sync/shelter-sync";
import { SnapshotLoadError } from "server/sync/snapshot";

async function main(): Promise<number> {
  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`[SHELTER SYNC] ${error.message}`);
      return 1;
    }
    throw error;
  }

  const controller = new AbortController();
  const stop = (signal: NodeJS.Signals) => {
    console.warn(`[SHELTER SYNC] Received ${signal}, stopping after the current page...`);
    controller.abort();
  };
  process.once("SIGINT", stop);
  process.once("SIGTERM", stop);

  try {
    await syncShelters(buildShelterSyncDeps(config), config.sync, { signal: controller.signal });
    return 0;
  } catch (error) {
    if (error instanceof SnapshotLoadError) {
      console.error(`[SHELTER SYNC] Aborting: ${error.message}`);
      return 1;
    }
    throw error;
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error("[SHELTER SYNC] Unexpected failure:", error);
    process.exitCode = 1;
  });
