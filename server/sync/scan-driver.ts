import type { SyncConfig } from "server/config";
import { delay, type Sleep } from "server/utils/delay";
import type { AddressLookup } from "./address-lookup";
import type { PageSource } from "./bbr-source";
import { classifyRecord } from "./classifier";
import type { CursorStore } from "./cursor-store";
import type { WriteBatcher } from "./write-batcher";
import type { AddressResult, Snapshot, UpstreamPage, UpstreamRecord } from "./types";

export interface ScanCounters {
  new: number;
  updated: number;
  restored: number;
  unchanged: number;
  addressRefreshed: number;
  missingLocation: number;
  discarded: number;
}

export interface ScanProgress {
  pages: number;
  seenIds: number;
  retries: number;
  counters: Readonly<ScanCounters>;
}

export type ScanStatus = "complete" | "aborted" | "interrupted";

export interface ScanOutcome extends ScanProgress {
  status: ScanStatus;
  /** Registry pagination ran out naturally with no fatal error. */
  completed: boolean;
  sourceErrorCount: number;
  /** Cursor the scan started from; null means the first page. */
  resumedFrom: string | null;
  abortReason?: string;
  seen: ReadonlySet<string>;
  unchangedIds: readonly string[];
}

/**
 * Page-level states. Only FETCH_PAGE talks to the registry; cursor persistence
 * happens in SAVE_CURSOR, strictly after the page's records are written.
 */
export type ScanState =
  | { name: "FETCH_PAGE"; attempt: number }
  | { name: "BACKOFF"; attempt: number; reason: string }
  | { name: "CLASSIFY_AND_QUEUE"; page: UpstreamPage }
  | { name: "SAVE_CURSOR"; page: UpstreamPage }
  | { name: "COMPLETE" }
  | { name: "ABORT"; status: "aborted" | "interrupted"; reason: string };

type TerminalState = Extract<ScanState, { name: "COMPLETE" | "ABORT" }>;
type ActiveState = Exclude<ScanState, TerminalState>;

export interface ScanDriverDeps {
  source: PageSource;
  cursorStore: CursorStore;
  snapshot: Snapshot;
  lookupAddress: AddressLookup;
  batcher: WriteBatcher;
  config: SyncConfig;
  /** Timestamp stamped on every write of this run. */
  runAt: Date;
  startCursor: string | null;
  sleep?: Sleep;
  random?: () => number;
  signal?: AbortSignal;
  onPage?: (progress: ScanProgress) => Promise<void>;
}

export function backoffMs(attempt: number, baseMs: number, random: () => number): number {
  return baseMs * 2 ** (attempt - 1) + random() * 1000;
}

export class ScanDriver {
  private readonly sleep: Sleep;
  private readonly random: () => number;
  private readonly seen = new Set<string>();
  private readonly unchangedIds: string[] = [];
  private readonly counters: ScanCounters = {
    new: 0,
    updated: 0,
    restored: 0,
    unchanged: 0,
    addressRefreshed: 0,
    missingLocation: 0,
    discarded: 0,
  };
  private after: string | null;
  private pages = 0;
  private retries = 0;
  private sourceErrorCount = 0;

  constructor(private readonly deps: ScanDriverDeps) {
    this.sleep = deps.sleep ?? delay;
    this.random = deps.random ?? Math.random;
    this.after = deps.startCursor;
  }

  async run(): Promise<ScanOutcome> {
    if (this.after) {
      console.log(`[SHELTER SYNC] Resuming from saved cursor: ${this.after.substring(0, 10)}...`);
    }

    const state = await this.drive(this.deps.config);

    if (state.name === "ABORT") {
      console.error(
        `[SHELTER SYNC] Scan stopped after page ${this.pages} (cursor=${this.after}, seen=${this.seen.size}): ${state.reason}`
      );
    }

    return {
      status: state.name === "COMPLETE" ? "complete" : state.status,
      completed: state.name === "COMPLETE",
      sourceErrorCount: this.sourceErrorCount,
      resumedFrom: this.deps.startCursor,
      abortReason: state.name === "ABORT" ? state.reason : undefined,
      ...this.progress(),
      seen: this.seen,
      unchangedIds: this.unchangedIds,
    };
  }

  private progress(): ScanProgress {
    return { pages: this.pages, seenIds: this.seen.size, retries: this.retries, counters: { ...this.counters } };
  }

  private async drive(config: SyncConfig): Promise<TerminalState> {
    let state: ScanState = { name: "FETCH_PAGE", attempt: 1 };
    for (;;) {
      if (state.name === "COMPLETE" || state.name === "ABORT") return state;
      state = await this.step(state, config);
    }
  }

  private async step(state: ActiveState, config: SyncConfig): Promise<ScanState> {
    switch (state.name) {
      case "FETCH_PAGE": {
        if (this.deps.signal?.aborted) {
          return { name: "ABORT", status: "interrupted", reason: "interrupted" };
        }
        const result = await this.deps.source({ first: config.pageSize, after: this.after, now: this.deps.runAt });
        switch (result.kind) {
          case "ok":
            return { name: "CLASSIFY_AND_QUEUE", page: result.data };
          case "retryable":
            if (state.attempt >= config.maxRetries) {
              this.sourceErrorCount++;
              return {
                name: "ABORT",
                status: "aborted",
                reason: `registry request failed after ${config.maxRetries} attempts (${result.reason})`,
              };
            }
            return { name: "BACKOFF", attempt: state.attempt, reason: result.reason };
          case "not-found":
            this.sourceErrorCount++;
            return { name: "ABORT", status: "aborted", reason: "registry returned not found" };
          case "fatal":
            this.sourceErrorCount++;
            return { name: "ABORT", status: "aborted", reason: result.reason };
        }
      }

      case "BACKOFF": {
        this.retries++;
        console.warn(
          `[SHELTER SYNC] Registry transient error (${state.reason}), retry ${state.attempt}/${config.maxRetries}...`
        );
        await this.sleep(backoffMs(state.attempt, config.retryBaseMs, this.random));
        return { name: "FETCH_PAGE", attempt: state.attempt + 1 };
      }

      case "CLASSIFY_AND_QUEUE": {
        this.pages++;
        if (this.pages === 1 || this.pages % config.logPageInterval === 0) {
          console.log(
            `[SHELTER SYNC] Progress: page=${this.pages}, nodes=${state.page.records.length}, seen=${this.seen.size}`
          );
        }
        for (const record of state.page.records) {
          await this.processRecord(record, config);
        }
        return { name: "SAVE_CURSOR", page: state.page };
      }

      case "SAVE_CURSOR": {
        const { hasNextPage, endCursor } = state.page;
        if (hasNextPage && !endCursor) {
          this.sourceErrorCount++;
          return { name: "ABORT", status: "aborted", reason: "registry reported more pages without a cursor" };
        }

        // Rows of this page must be stored before the cursor moves past them
        await this.deps.batcher.flush();
        this.after = hasNextPage ? endCursor : null;
        await this.deps.cursorStore.save(this.after);
        await this.deps.onPage?.(this.progress());

        if (!hasNextPage) {
          console.log(`[SHELTER SYNC] Page ${this.pages} was the last page`);
          return { name: "COMPLETE" };
        }
        await this.sleep(config.pageDelayMs);
        return { name: "FETCH_PAGE", attempt: 1 };
      }
    }
  }

  private async processRecord(record: UpstreamRecord, config: SyncConfig): Promise<void> {
    const { runAt, snapshot, batcher } = this.deps;
    const decision = classifyRecord(record, snapshot, runAt, config.addressRefreshDays);
    if (!decision) {
      this.counters.discarded++;
      return;
    }

    this.seen.add(decision.externalId);

    switch (decision.classification) {
      case "new":
        this.counters.new++;
        break;
      case "restored":
        this.counters.restored++;
        break;
      case "updated":
        this.counters.updated++;
        break;
      case "address_refresh":
        this.counters.addressRefreshed++;
        break;
      case "unchanged":
        this.counters.unchanged++;
        this.unchangedIds.push(decision.externalId);
        return;
    }

    const core = {
      externalId: decision.externalId,
      capacity: decision.capacity,
      usageCode: decision.usageCode,
      municipalityCode: decision.municipalityCode,
      lastChecked: runAt,
      lastSeenAt: runAt,
    };

    if (!decision.needsEnrichment) {
      await batcher.add({ kind: "core", row: core });
      return;
    }

    let address: AddressResult | null = null;
    if (decision.addressPointId) {
      address = await this.deps.lookupAddress(decision.addressPointId);
      await this.sleep(config.enrichmentDelayMs);
    }
    if (!address?.location) {
      this.counters.missingLocation++;
    }
    await batcher.add({ kind: "full", row: { ...core, lastAddressChecked: runAt, address } });
  }
}
