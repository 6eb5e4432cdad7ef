import { and, asc, inArray, isNull, sql, type SQL } from "drizzle-orm";
import type { PgColumn } from "drizzle-orm/pg-core";
import { buildingUsages, municipalities } from "@database/schemas/lookups.schema";
import { shelters } from "@database/schemas/shelters.schema";
import type { InsertShelter, LonLat } from "@database/types/shelters";
import type { Database } from "server/storage";

export interface AddressFields {
  address: string | null;
  streetName: string | null;
  houseNumber: string | null;
  postalCode: string | null;
  location: LonLat | null;
}

/** Core fields only: capacity and codes changed upstream. */
export interface CoreShelterWrite {
  externalId: string;
  capacity: number;
  usageCode: string | null;
  municipalityCode: string | null;
  lastChecked: Date;
  lastSeenAt: Date;
}

/** Core fields plus fresh enrichment. Always leaves the row active. */
export interface FullShelterWrite extends CoreShelterWrite {
  lastAddressChecked: Date;
  address: AddressFields | null;
}

/** Last-resort write: codes are nulled so a bad foreign key cannot block the save. */
export interface RescueShelterWrite {
  externalId: string;
  capacity: number;
  lastChecked: Date;
}

export interface SnapshotRow {
  id: string;
  externalId: string;
  capacity: number | null;
  deleted: Date | null;
  lastChecked: Date | null;
  lastAddressChecked: Date | null;
  hasLocation: boolean;
  usageCode: string | null;
  municipalityCode: string | null;
}

/** Codes a batch refers to; they must exist in the lookup tables before the shelters do. */
export interface LookupCodes {
  usageCodes: string[];
  municipalityCodes: string[];
}

export interface ShelterStore {
  loadSnapshotPage(offset: number, limit: number): Promise<SnapshotRow[]>;
  registerCodes(codes: LookupCodes): Promise<void>;
  upsertFull(rows: FullShelterWrite[]): Promise<void>;
  upsertCore(rows: CoreShelterWrite[]): Promise<void>;
  upsertRescue(row: RescueShelterWrite): Promise<void>;
  touchLastSeen(externalIds: string[], seenAt: Date): Promise<void>;
  softDelete(ids: string[], deletedAt: Date): Promise<void>;
  countActive(): Promise<number>;
}

const excluded = (column: PgColumn): SQL => sql.raw(`excluded."${column.name}"`);
// Enrichment columns are only replaced by non-null lookup values
const keepExisting = (column: PgColumn): SQL => sql`coalesce(${excluded(column)}, ${column})`;

function toFullInsert(row: FullShelterWrite): InsertShelter {
  return {
    externalId: row.externalId,
    capacity: row.capacity,
    usageCode: row.usageCode,
    municipalityCode: row.municipalityCode,
    address: row.address?.address ?? null,
    streetName: row.address?.streetName ?? null,
    houseNumber: row.address?.houseNumber ?? null,
    postalCode: row.address?.postalCode ?? null,
    location: row.address?.location ?? null,
    deleted: null,
    lastChecked: row.lastChecked,
    lastSeenAt: row.lastSeenAt,
    lastAddressChecked: row.lastAddressChecked,
  };
}

export class DrizzleShelterStore implements ShelterStore {
  constructor(private readonly db: Database) {}

  async loadSnapshotPage(offset: number, limit: number): Promise<SnapshotRow[]> {
    return this.db
      .select({
        id: shelters.id,
        externalId: shelters.externalId,
        capacity: shelters.capacity,
        deleted: shelters.deleted,
        lastChecked: shelters.lastChecked,
        lastAddressChecked: shelters.lastAddressChecked,
        hasLocation: sql<boolean>`${shelters.location} is not null`,
        usageCode: shelters.usageCode,
        municipalityCode: shelters.municipalityCode,
      })
      .from(shelters)
      .orderBy(asc(shelters.id))
      .limit(limit)
      .offset(offset);
  }

  async registerCodes({ usageCodes, municipalityCodes }: LookupCodes): Promise<void> {
    if (usageCodes.length > 0) {
      await this.db
        .insert(buildingUsages)
        .values(usageCodes.map((code) => ({ code })))
        .onConflictDoNothing();
    }
    if (municipalityCodes.length > 0) {
      await this.db
        .insert(municipalities)
        .values(municipalityCodes.map((code) => ({ code })))
        .onConflictDoNothing();
    }
  }

  async upsertFull(rows: FullShelterWrite[]): Promise<void> {
    if (rows.length === 0) return;
    await this.db
      .insert(shelters)
      .values(rows.map(toFullInsert))
      .onConflictDoUpdate({
        target: shelters.externalId,
        set: {
          capacity: excluded(shelters.capacity),
          usageCode: excluded(shelters.usageCode),
          municipalityCode: excluded(shelters.municipalityCode),
          address: keepExisting(shelters.address),
          streetName: keepExisting(shelters.streetName),
          houseNumber: keepExisting(shelters.houseNumber),
          postalCode: keepExisting(shelters.postalCode),
          location: keepExisting(shelters.location),
          deleted: sql`null`,
          lastChecked: excluded(shelters.lastChecked),
          lastSeenAt: excluded(shelters.lastSeenAt),
          lastAddressChecked: excluded(shelters.lastAddressChecked),
        },
      });
  }

  async upsertCore(rows: CoreShelterWrite[]): Promise<void> {
    if (rows.length === 0) return;
    await this.db
      .insert(shelters)
      .values(
        rows.map((row) => ({
          externalId: row.externalId,
          capacity: row.capacity,
          usageCode: row.usageCode,
          municipalityCode: row.municipalityCode,
          lastChecked: row.lastChecked,
          lastSeenAt: row.lastSeenAt,
        }))
      )
      .onConflictDoUpdate({
        target: shelters.externalId,
        set: {
          capacity: excluded(shelters.capacity),
          usageCode: excluded(shelters.usageCode),
          municipalityCode: excluded(shelters.municipalityCode),
          lastChecked: excluded(shelters.lastChecked),
          lastSeenAt: excluded(shelters.lastSeenAt),
        },
      });
  }

  async upsertRescue(row: RescueShelterWrite): Promise<void> {
    await this.db
      .insert(shelters)
      .values({
        externalId: row.externalId,
        capacity: row.capacity,
        lastChecked: row.lastChecked,
        deleted: null,
        usageCode: null,
        municipalityCode: null,
      })
      .onConflictDoUpdate({
        target: shelters.externalId,
        set: {
          capacity: excluded(shelters.capacity),
          lastChecked: excluded(shelters.lastChecked),
          deleted: sql`null`,
          usageCode: sql`null`,
          municipalityCode: sql`null`,
        },
      });
  }

  async touchLastSeen(externalIds: string[], seenAt: Date): Promise<void> {
    if (externalIds.length === 0) return;
    await this.db.update(shelters).set({ lastSeenAt: seenAt }).where(inArray(shelters.externalId, externalIds));
  }

  async softDelete(ids: string[], deletedAt: Date): Promise<void> {
    if (ids.length === 0) return;
    await this.db
      .update(shelters)
      .set({ deleted: deletedAt })
      .where(and(inArray(shelters.id, ids), isNull(shelters.deleted)));
  }

  async countActive(): Promise<number> {
    const [result] = await this.db
      .select({ count: sql<number>`count(*)` })
      .from(shelters)
      .where(isNull(shelters.deleted));
    return Number(result?.count ?? 0);
  }
}
