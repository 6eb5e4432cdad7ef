import type { AddressFields } from "server/services/shelters/shelters.services";

/** One building as delivered by the registry for this scan pass. */
export interface UpstreamRecord {
  externalId: string;
  /** Raw registry value; validated by the classifier. */
  capacity: unknown;
  usageCode: string | null;
  municipalityCode: string | null;
  addressPointId: string | null;
}

export interface UpstreamPage {
  records: UpstreamRecord[];
  hasNextPage: boolean;
  endCursor: string | null;
}

export interface PageRequest {
  first: number;
  after: string | null;
  /** Bitemporal "as of" timestamp sent to the registry. */
  now: Date;
}

export interface SnapshotEntry {
  id: string;
  capacity: number | null;
  deleted: boolean;
  lastChecked: Date | null;
  lastAddressChecked: Date | null;
  hasLocation: boolean;
  usageCode: string | null;
  municipalityCode: string | null;
}

/** Read-only baseline of local state keyed by external id. */
export type Snapshot = ReadonlyMap<string, Readonly<SnapshotEntry>>;

export type AddressResult = AddressFields;

export type Classification = "new" | "restored" | "updated" | "address_refresh" | "unchanged";

export type RefreshReason = "missing_location" | "stale";

export interface ShelterDecision {
  classification: Classification;
  externalId: string;
  capacity: number;
  usageCode: string | null;
  municipalityCode: string | null;
  addressPointId: string | null;
  needsEnrichment: boolean;
  clearDeleted: boolean;
  refreshReason?: RefreshReason;
}
