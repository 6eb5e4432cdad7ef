export * from "./lookups.schema";
export * from "./shelters.schema";
export * from "./sync.schema";
