import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { DEFAULT_SYNC_CONFIG } from "server/config";
import type { PageSource } from "server/sync/bbr-source";
import { createShelterSyncRunner } from "./shelter-sync";
import { InMemoryShelterStore, InMemorySyncStateStore, MemoryReporter, noSleep } from "server/test/fakes";
import type { ShelterSyncDeps } from "server/sync/shelter-sync";

function deps(source: PageSource, shelterStore = new InMemoryShelterStore()): ShelterSyncDeps {
  return {
    shelterStore,
    syncStateStore: new InMemorySyncStateStore(),
    source,
    lookupAddress: async () => null,
    reporter: new MemoryReporter(),
    sleep: noSleep,
  };
}

const emptyRegistry: PageSource = async () => ({ kind: "ok", data: { records: [], hasNextPage: false, endCursor: null } });

describe("createShelterSyncRunner", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("remembers the last summary", async () => {
    const runner = createShelterSyncRunner(deps(emptyRegistry), DEFAULT_SYNC_CONFIG);
    expect(runner.lastSummary).toBeNull();

    const summary = await runner.run();

    expect(summary?.completed).toBe(true);
    expect(runner.lastSummary).toBe(summary);
    expect(runner.running).toBe(false);
  });

  it("refuses to start while a run is in progress", async () => {
    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const slowRegistry: PageSource = async (request) => {
      await gate;
      return emptyRegistry(request);
    };
    const runner = createShelterSyncRunner(deps(slowRegistry), DEFAULT_SYNC_CONFIG);

    const first = runner.run();
    await vi.waitFor(() => expect(runner.running).toBe(true));
    expect(await runner.run()).toBeNull();

    release();
    expect((await first)?.completed).toBe(true);
    expect(runner.running).toBe(false);
  });

  it("records the error of a failed run and rethrows it", async () => {
    const store = new InMemoryShelterStore();
    store.snapshotFailures = DEFAULT_SYNC_CONFIG.snapshotAttempts;
    const runner = createShelterSyncRunner(deps(emptyRegistry, store), { ...DEFAULT_SYNC_CONFIG, snapshotBackoffMs: 0 });

    await expect(runner.run()).rejects.toThrow("Could not load shelter snapshot at offset 0");
    expect(runner.lastError).toBe("Could not load shelter snapshot at offset 0");
    expect(runner.running).toBe(false);
  });
});
