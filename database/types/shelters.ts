import { shelters } from "../schemas/shelters.schema";

export type InsertShelter = typeof shelters.$inferInsert;

/** [longitude, latitude], WGS84 */
export type LonLat = [number, number];
