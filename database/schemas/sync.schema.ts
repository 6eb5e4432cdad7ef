import { pgTable, serial, varchar, text, timestamp } from "drizzle-orm/pg-core";

export const syncState = pgTable("sync_state", {
  id: serial("id").primaryKey(),
  slot: varchar("slot", { length: 100 }).unique().notNull(),
  cursor: text("cursor"),
  lastRunAt: timestamp("last_run_at"),
  updatedAt: timestamp("updated_at").defaultNow(),
});
