import { pgTable, varchar, text } from "drizzle-orm/pg-core";

// BBR byg021BygningensAnvendelse codes
export const buildingUsages = pgTable("building_usages", {
  code: varchar("code", { length: 10 }).primaryKey(),
  description: text("description"),
});

export const municipalities = pgTable("municipalities", {
  code: varchar("code", { length: 10 }).primaryKey(),
  name: text("name"),
});
