import {
  ENTITIES,
  columnKind,
  type ColumnKind,
  type EntityKind,
  type EntityRecord,
} from "./entities.js";
import { timedQuery, withSession, type DbClient } from "./client.js";
import {
  StoreError,
  type FindOptions,
  type OrderBy,
  type Predicate,
  type Scalar,
  type Store,
  type StoreProvider,
  type TopHolderRow,
  type TransferHistoryRow,
} from "./store.js";

export interface SqlQuery {
  text: string;
  values: unknown[];
}

// ============================================================
// SQL building
// ============================================================

function quoteColumn(kind: EntityKind, column: string, alias?: string): string {
  if (!columnKind(kind, column)) {
    throw new StoreError(`Unknown column "${column}" on ${ENTITIES[kind].table}`);
  }
  return alias ? `${alias}."${column}"` : `"${column}"`;
}

function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (c) => `\\${c}`);
}

/** Build a parameterized WHERE clause; values are appended to `values` */
export function buildWhere(kind: EntityKind, where: Predicate[], values: unknown[], alias?: string): string {
  const param = (v: unknown): string => {
    values.push(v);
    return `$${values.length}`;
  };

  const clauses = where.map((p): string => {
    switch (p.op) {
      case "eq":
        return p.value === null
          ? `${quoteColumn(kind, p.column, alias)} IS NULL`
          : `${quoteColumn(kind, p.column, alias)} = ${param(p.value)}`;
      case "gt":
        return `${quoteColumn(kind, p.column, alias)} > ${param(p.value)}`;
      case "in":
        if (p.values.length === 0) return "FALSE";
        return `${quoteColumn(kind, p.column, alias)} IN (${p.values.map(param).join(", ")})`;
      case "notIn":
        if (p.values.length === 0) return "TRUE";
        return `${quoteColumn(kind, p.column, alias)} NOT IN (${p.values.map(param).join(", ")})`;
      case "prefix":
        return `${quoteColumn(kind, p.column, alias)} LIKE ${param(escapeLike(p.value) + "%")}`;
      case "tupleIn": {
        if (p.values.length === 0) return "FALSE";
        const cols = p.columns.map((c) => quoteColumn(kind, c, alias)).join(", ");
        const rows = p.values.map((row: Scalar[]) => `(${row.map(param).join(", ")})`);
        return `(${cols}) IN (${rows.join(", ")})`;
      }
    }
  });

  return clauses.length > 0 ? `WHERE ${clauses.join(" AND ")}` : "";
}

function buildOrderBy(kind: EntityKind, orderBy: OrderBy[]): string {
  if (orderBy.length === 0) return "";
  const parts = orderBy.map((o) => {
    const nulls = o.nulls ? ` NULLS ${o.nulls === "last" ? "LAST" : "FIRST"}` : "";
    return `${quoteColumn(kind, o.column)} ${o.direction === "desc" ? "DESC" : "ASC"}${nulls}`;
  });
  return `ORDER BY ${parts.join(", ")}`;
}

function selectList(kind: EntityKind, alias?: string): string {
  return Object.keys(ENTITIES[kind].columns)
    .map((c) => quoteColumn(kind, c, alias))
    .join(", ");
}

export function buildSelect(kind: EntityKind, options: FindOptions = {}): SqlQuery {
  const values: unknown[] = [];
  const parts = [`SELECT ${selectList(kind)} FROM ${ENTITIES[kind].table}`];

  const where = buildWhere(kind, options.where ?? [], values);
  if (where) parts.push(where);
  const order = buildOrderBy(kind, options.orderBy ?? []);
  if (order) parts.push(order);
  if (options.limit !== undefined) {
    values.push(options.limit);
    parts.push(`LIMIT $${values.length}`);
  }
  if (options.offset) {
    values.push(options.offset);
    parts.push(`OFFSET $${values.length}`);
  }
  return { text: parts.join(" "), values };
}

export function buildCount(kind: EntityKind, where: Predicate[] = []): SqlQuery {
  const values: unknown[] = [];
  const clause = buildWhere(kind, where, values);
  const text = `SELECT COUNT(*) AS count FROM ${ENTITIES[kind].table}${clause ? ` ${clause}` : ""}`;
  return { text, values };
}

export function buildTransferHistory(accountHex: string, limit: number, offset: number): SqlQuery {
  const values: unknown[] = [JSON.stringify([{ value: accountHex }])];
  const where = `WHERE e."module_id" = 'balances' AND e."event_id" = 'Transfer' AND e."attributes" @> $1::jsonb`;
  values.push(limit, offset);
  return {
    text:
      `SELECT ${selectList("event", "e")}, b."datetime" AS "datetime", COUNT(*) OVER() AS total_count ` +
      `FROM ${ENTITIES.event.table} e LEFT JOIN ${ENTITIES.block.table} b ON b."id" = e."block_id" ` +
      `${where} ORDER BY e."block_id" DESC, e."event_idx" DESC LIMIT $2 OFFSET $3`,
    values,
  };
}

export function buildTopHolders(accountPrefixHex: string, limit: number): SqlQuery {
  const table = ENTITIES.accountinfosnapshot.table;
  return {
    text:
      `SELECT * FROM (` +
      `SELECT DISTINCT ON ("account_id") "block_id", "account_id", "balance_total", "balance_free", "balance_reserved" ` +
      `FROM ${table} WHERE "account_id" LIKE $1 ORDER BY "account_id", "block_id" DESC` +
      `) latest ORDER BY "balance_total" DESC NULLS LAST LIMIT $2`,
    values: [escapeLike(accountPrefixHex) + "%", limit],
  };
}

// ============================================================
// Row mapping
// ============================================================

function mapValue(kind: ColumnKind, raw: unknown): unknown {
  if (raw === null || raw === undefined) return null;
  switch (kind.replace("?", "")) {
    case "int":
      return Number(raw);
    case "bool":
      return raw === true || raw === 1 || raw === "1" || raw === "t";
    case "decimal":
      return String(raw);
    case "timestamp":
      return raw instanceof Date ? raw.toISOString() : String(raw);
    case "json":
      return typeof raw === "string" ? JSON.parse(raw) : raw;
    default:
      return String(raw);
  }
}

export function mapRow<K extends EntityKind>(kind: K, row: Record<string, unknown>): EntityRecord<K> {
  const out: Record<string, unknown> = {};
  const columns: Readonly<Record<string, ColumnKind>> = ENTITIES[kind].columns;
  for (const [column, ck] of Object.entries(columns)) {
    out[column] = mapValue(ck, row[column]);
  }
  return out as EntityRecord<K>;
}

// ============================================================
// PgStore
// ============================================================

export class PgStore implements Store {
  constructor(private readonly client: DbClient) {}

  private async run(label: string, q: SqlQuery): Promise<Record<string, unknown>[]> {
    try {
      const result = await timedQuery(this.client, q.text, q.values);
      return result.rows;
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new StoreError(`${label} failed: ${message}`, { cause: err });
    }
  }

  async findMany<K extends EntityKind>(kind: K, options?: FindOptions): Promise<EntityRecord<K>[]> {
    const rows = await this.run(`findMany(${kind})`, buildSelect(kind, options));
    return rows.map((row) => mapRow(kind, row));
  }

  async findOne<K extends EntityKind>(
    kind: K,
    where: Predicate[],
    orderBy: OrderBy[] = [],
  ): Promise<EntityRecord<K> | null> {
    const rows = await this.run(`findOne(${kind})`, buildSelect(kind, { where, orderBy, limit: 1 }));
    const row = rows[0];
    return row ? mapRow(kind, row) : null;
  }

  async count(kind: EntityKind, where: Predicate[] = []): Promise<number> {
    const rows = await this.run(`count(${kind})`, buildCount(kind, where));
    return parseInt(String(rows[0]?.count ?? "0"), 10);
  }

  async transferEventsByParticipant(params: {
    accountHex: string;
    limit: number;
    offset: number;
  }): Promise<{ rows: TransferHistoryRow[]; total: number }> {
    const rows = await this.run(
      "transferEventsByParticipant",
      buildTransferHistory(params.accountHex, params.limit, params.offset),
    );
    let total = parseInt(String(rows[0]?.total_count ?? "0"), 10);
    if (rows.length === 0 && params.offset > 0) {
      // Past the last page: COUNT(*) OVER() has no row to ride on
      const counted = await this.run("transferEventsByParticipant(count)", {
        text:
          `SELECT COUNT(*) AS count FROM ${ENTITIES.event.table} WHERE "module_id" = 'balances' ` +
          `AND "event_id" = 'Transfer' AND "attributes" @> $1::jsonb`,
        values: [JSON.stringify([{ value: params.accountHex }])],
      });
      total = parseInt(String(counted[0]?.count ?? "0"), 10);
    }
    return {
      rows: rows.map((row) => ({
        ...mapRow("event", row),
        datetime: row.datetime == null ? null : String(mapValue("timestamp", row.datetime)),
      })),
      total,
    };
  }

  async topHolders(params: { accountPrefixHex: string; limit: number }): Promise<TopHolderRow[]> {
    const rows = await this.run("topHolders", buildTopHolders(params.accountPrefixHex, params.limit));
    return rows.map((row) => ({
      block_id: Number(row.block_id),
      account_id: String(row.account_id),
      balance_total: row.balance_total == null ? null : String(row.balance_total),
      balance_free: row.balance_free == null ? null : String(row.balance_free),
      balance_reserved: row.balance_reserved == null ? null : String(row.balance_reserved),
    }));
  }
}

/** Store provider backed by the shared pg pool; one checked-out client per call */
export const pgStoreProvider: StoreProvider = {
  withStore<T>(fn: (store: Store) => Promise<T>): Promise<T> {
    return withSession((client) => fn(new PgStore(client)));
  },
};
