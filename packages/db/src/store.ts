import type { EntityKind, EntityRecord, EventRecord } from "./entities.js";

// ============================================================
// Store: read-only access to the indexed chain data
// ============================================================

export type Scalar = string | number | boolean;

export type Predicate =
  | { op: "eq"; column: string; value: Scalar | null }
  | { op: "gt"; column: string; value: Scalar }
  | { op: "in"; column: string; values: Scalar[] }
  | { op: "notIn"; column: string; values: Scalar[] }
  | { op: "prefix"; column: string; value: string }
  /** Row-value membership, e.g. (block_id, event_idx) IN ((1, 2), (1, 3)) */
  | { op: "tupleIn"; columns: string[]; values: Scalar[][] };

export interface OrderBy {
  column: string;
  direction: "asc" | "desc";
  /** Postgres default: NULLs rank above every value */
  nulls?: "first" | "last";
}

export interface FindOptions {
  where?: Predicate[];
  orderBy?: OrderBy[];
  limit?: number;
  offset?: number;
}

/** One balance transfer event plus the datetime of its block */
export type TransferHistoryRow = EventRecord & { datetime: string | null };

export interface TopHolderRow {
  block_id: number;
  /** Hex account id (no 0x) */
  account_id: string;
  balance_total: string | null;
  balance_free: string | null;
  balance_reserved: string | null;
}

export interface Store {
  findMany<K extends EntityKind>(kind: K, options?: FindOptions): Promise<EntityRecord<K>[]>;
  findOne<K extends EntityKind>(
    kind: K,
    where: Predicate[],
    orderBy?: OrderBy[],
  ): Promise<EntityRecord<K> | null>;
  count(kind: EntityKind, where?: Predicate[]): Promise<number>;

  /** balances.Transfer events whose attribute values contain the raw DID, newest block first */
  transferEventsByParticipant(params: {
    accountHex: string;
    limit: number;
    offset: number;
  }): Promise<{ rows: TransferHistoryRow[]; total: number }>;

  /** Latest snapshot per account whose hex id starts with `accountPrefixHex`, richest first */
  topHolders(params: { accountPrefixHex: string; limit: number }): Promise<TopHolderRow[]>;
}

/** Hands out a Store bound to one session for the duration of `fn` */
export interface StoreProvider {
  withStore<T>(fn: (store: Store) => Promise<T>): Promise<T>;
}

export class StoreError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StoreError";
  }
}
