import pg from "pg";

const { Pool } = pg;

export type DbPool = pg.Pool;
export type DbClient = pg.PoolClient;

let pool: DbPool | null = null;

/** Queries slower than this are logged at [DB] */
const SLOW_QUERY_MS = 250;

// ============================================================
// Pool & Session Functions
// ============================================================

/** Initialize the connection pool */
export function createPool(connectionString: string): DbPool {
  if (pool) return pool;

  pool = new Pool({
    connectionString,
    max: 20,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 5_000,
  });

  pool.on("error", (err) => {
    console.error("[DB] Unexpected pool error:", err.message);
  });

  return pool;
}

/** Get the existing pool; createPool must have run first */
export function getPool(): DbPool {
  if (!pool) {
    throw new Error("[DB] Pool not initialized, call createPool() first");
  }
  return pool;
}

/** Run a query on a checked-out client, logging slow statements */
export async function timedQuery<T extends pg.QueryResultRow = Record<string, unknown>>(
  client: DbClient,
  text: string,
  params?: unknown[],
): Promise<pg.QueryResult<T>> {
  const start = performance.now();
  try {
    return await client.query<T>(text, params);
  } finally {
    const elapsed = performance.now() - start;
    if (elapsed > SLOW_QUERY_MS) {
      console.warn(`[DB] Slow query (${Math.round(elapsed)}ms): ${text.replace(/\s+/g, " ").slice(0, 160)}`);
    }
  }
}

/**
 * Check out one client for the duration of `fn` and release it on every
 * exit path. Each API request runs its reads through one session.
 */
export async function withSession<T>(fn: (client: DbClient) => Promise<T>): Promise<T> {
  const client = await getPool().connect();
  try {
    return await fn(client);
  } finally {
    client.release();
  }
}

/** Graceful shutdown */
export async function closePool(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
  }
}
