export { openDatabase } from "./connection";
export { ensureSchema, SCHEMA_VERSION } from "./schema";
export * from "./queries";
export type * from "./types";
