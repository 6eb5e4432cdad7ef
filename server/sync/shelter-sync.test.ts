import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { DEFAULT_SYNC_CONFIG, type SyncConfig } from "server/config";
import { syncShelters, type ShelterSyncDeps } from "./shelter-sync";
import { SnapshotLoadError } from "./snapshot";
import { fatal, type FetchResult } from "./result";
import type { AddressResult, UpstreamPage } from "./types";
import {
  InMemoryShelterStore,
  InMemorySyncStateStore,
  MemoryReporter,
  noSleep,
  page,
  record,
  scriptedSource,
} from "server/test/fakes";

const RUN_AT = new Date("2026-03-01T03:00:00Z");

const CONFIG: SyncConfig = {
  ...DEFAULT_SYNC_CONFIG,
  slot: "test-slot",
  pageSize: 2,
  safeThreshold: 2,
  minCoverage: 0.5,
  pageDelayMs: 0,
  enrichmentDelayMs: 0,
  snapshotBackoffMs: 0,
};

const ADDRESS: AddressResult = {
  address: "Testvej 1, 8000 Aarhus C",
  streetName: "Testvej",
  houseNumber: "1",
  postalCode: "8000",
  location: [10.2, 56.1],
};

function harness(results: FetchResult<UpstreamPage>[]) {
  const shelterStore = new InMemoryShelterStore();
  const syncStateStore = new InMemorySyncStateStore();
  const reporter = new MemoryReporter();
  const { source, requests } = scriptedSource(results);

  shelterStore.seed({ externalId: "K1", capacity: 50, usageCode: "120", municipalityCode: "0101", location: [10, 56], lastAddressChecked: RUN_AT });
  shelterStore.seed({ externalId: "K2", capacity: 30, usageCode: "120", municipalityCode: "0101", location: [10, 56], lastAddressChecked: RUN_AT });
  shelterStore.seed({ externalId: "OLD", capacity: 8, location: [10, 56], lastAddressChecked: RUN_AT });
  shelterStore.seed({ externalId: "GONE", capacity: 8, deleted: new Date("2025-12-01T00:00:00Z") });

  const deps: ShelterSyncDeps = {
    shelterStore,
    syncStateStore,
    source,
    lookupAddress: async () => ADDRESS,
    reporter,
    clock: () => RUN_AT,
    sleep: noSleep,
    random: () => 0,
  };
  return { deps, shelterStore, syncStateStore, reporter, requests };
}

describe("syncShelters", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("reconciles a full registry pass and soft-deletes orphans", async () => {
    const { deps, shelterStore, syncStateStore, reporter } = harness([
      page([record("K1"), record("K2")], "c1"),
      page([record("NEW1")]),
    ]);

    const summary = await syncShelters(deps, CONFIG);

    expect(summary).toMatchObject({
      new: 1,
      updated: 1,
      unchanged: 1,
      restored: 0,
      deleted: 1,
      pages: 2,
      seenIds: 3,
      activeExisting: 3,
      minSeenRequired: 2,
      completed: true,
      sourceHadErrors: false,
      resumed: false,
      interrupted: false,
      deletionSkippedReason: null,
    });
    expect(shelterStore.get("OLD")?.deleted).toEqual(RUN_AT);
    expect(shelterStore.get("GONE")?.deleted).toEqual(new Date("2025-12-01T00:00:00Z"));
    expect(shelterStore.get("K2")?.capacity).toBe(50);
    expect(shelterStore.get("NEW1")).toMatchObject({ address: "Testvej 1, 8000 Aarhus C", location: [10.2, 56.1] });
    expect(shelterStore.touched).toEqual(["K1"]);
    expect(shelterStore.get("K1")?.lastSeenAt).toEqual(RUN_AT);
    expect(syncStateStore.writes).toEqual(["c1", null]);
    expect(reporter.writes.map((w) => w.pages)).toEqual([0, 1, 2, 2]);
    expect(reporter.stepSummaries).toHaveLength(1);
  });

  it("restores a soft-deleted shelter that reappears upstream", async () => {
    const { deps, shelterStore } = harness([page([record("K1"), record("K2")], "c1"), page([record("GONE"), record("OLD")])]);

    const summary = await syncShelters(deps, CONFIG);

    expect(summary.restored).toBe(1);
    expect(summary.deleted).toBe(0);
    expect(shelterStore.get("GONE")?.deleted).toBeNull();
  });

  it("never deletes after a resumed scan", async () => {
    const { deps, shelterStore, syncStateStore, requests } = harness([page([record("NEW1")])]);
    await syncStateStore.write("test-slot", "c9", RUN_AT);

    const summary = await syncShelters(deps, CONFIG);

    expect(requests[0]?.after).toBe("c9");
    expect(summary.resumed).toBe(true);
    expect(summary.deleted).toBe(0);
    expect(summary.deletionSkippedReason).toBe("scan resumed from a saved cursor and did not cover the full registry");
    expect(shelterStore.get("OLD")?.deleted).toBeNull();
  });

  it("flushes queued writes and skips deletion when the registry fails", async () => {
    const { deps, shelterStore, syncStateStore } = harness([page([record("NEW1")], "c1"), fatal("status 400: bad query")]);

    const summary = await syncShelters(deps, CONFIG);

    expect(summary).toMatchObject({
      completed: false,
      sourceErrorCount: 1,
      sourceHadErrors: true,
      deleted: 0,
      deletionSkippedReason: "scan did not complete successfully",
    });
    expect(shelterStore.get("NEW1")?.capacity).toBe(50);
    expect(shelterStore.get("OLD")?.deleted).toBeNull();
    expect(syncStateStore.slots.get("test-slot")?.cursor).toBe("c1");
  });

  it("leaves last_seen_at alone when the scan does not complete", async () => {
    const { deps, shelterStore } = harness([page([record("K1")], "c1"), fatal("status 400: bad query")]);

    const summary = await syncShelters(deps, CONFIG);

    expect(summary.completed).toBe(false);
    expect(summary.unchanged).toBe(1);
    expect(shelterStore.touched).toEqual([]);
    expect(shelterStore.get("K1")?.lastSeenAt).toBeNull();
  });

  it("reports an interrupted run without deleting", async () => {
    const controller = new AbortController();
    controller.abort();
    const { deps, requests } = harness([]);

    const summary = await syncShelters(deps, CONFIG, { signal: controller.signal });

    expect(requests).toEqual([]);
    expect(summary.interrupted).toBe(true);
    expect(summary.sourceHadErrors).toBe(false);
    expect(summary.deletionSkippedReason).toBe("scan did not complete successfully");
  });

  it("still finishes when last-seen updates fail", async () => {
    const { deps, shelterStore } = harness([page([record("K1"), record("K2")], "c1"), page([record("OLD")])]);
    shelterStore.failTouch = true;

    const summary = await syncShelters(deps, CONFIG);

    expect(summary.completed).toBe(true);
    expect(summary.unchanged).toBe(1);
    expect(shelterStore.get("K1")?.lastSeenAt).toBeNull();
  });

  it("aborts before scanning when the local snapshot cannot be loaded", async () => {
    const { deps, shelterStore, reporter, requests } = harness([page([])]);
    shelterStore.snapshotFailures = CONFIG.snapshotAttempts;

    await expect(syncShelters(deps, CONFIG)).rejects.toBeInstanceOf(SnapshotLoadError);
    expect(requests).toEqual([]);
    expect(reporter.writes).toEqual([]);
  });
});
