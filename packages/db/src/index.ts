export { createPool, getPool, timedQuery, withSession, closePool } from "./client.js";
export type { DbPool, DbClient } from "./client.js";
export * from "./entities.js";
export * from "./store.js";
export {
  PgStore,
  pgStoreProvider,
  buildSelect,
  buildCount,
  buildWhere,
  buildTransferHistory,
  buildTopHolders,
  mapRow,
} from "./pg-store.js";
export type { SqlQuery } from "./pg-store.js";
