import { syncState } from "../schemas/sync.schema";

export type InsertSyncState = typeof syncState.$inferInsert;
