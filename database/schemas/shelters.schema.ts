import {
  pgTable,
  uuid,
  varchar,
  integer,
  text,
  timestamp,
  geometry,
  index,
} from "drizzle-orm/pg-core";
import { buildingUsages, municipalities } from "./lookups.schema";

export const shelters = pgTable(
  "shelters",
  {
    id: uuid("id").defaultRandom().primaryKey(),
    // BBR id_lokalId, immutable once created
    externalId: varchar("external_id", { length: 64 }).unique().notNull(),
    capacity: integer("capacity").notNull(),
    usageCode: varchar("usage_code", { length: 10 }).references(() => buildingUsages.code, { onDelete: "set null" }),
    municipalityCode: varchar("municipality_code", { length: 10 }).references(() => municipalities.code, {
      onDelete: "set null",
    }),

    // Enrichment from DAWA
    address: text("address"),
    streetName: varchar("street_name", { length: 200 }),
    houseNumber: varchar("house_number", { length: 20 }),
    postalCode: varchar("postal_code", { length: 10 }),
    location: geometry("location", { type: "point", mode: "tuple", srid: 4326 }),

    // null = active
    deleted: timestamp("deleted"),
    lastChecked: timestamp("last_checked"),
    lastSeenAt: timestamp("last_seen_at"),
    lastAddressChecked: timestamp("last_address_checked"),
    createdAt: timestamp("created_at").defaultNow(),
  },
  (table) => ({
    deletedIdx: index("shelters_deleted_idx").on(table.deleted),
    locationIdx: index("shelters_location_idx").using("gist", table.location),
  })
);
