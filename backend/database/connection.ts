import { Pool, PoolConfig, QueryResult, QueryResultRow } from "pg";

// Pool behind the shared session store (workflow_sessions, see sql/schema.sql).
// Created lazily on the first query, so a server running the in-memory store
// never opens a connection. Each query is a single statement: compare-and-set
// saves rely on the row-level WHERE on revision, not on transactions.

let pool: Pool | undefined;

export function getDatabasePool(): Pool {
  if (!pool) {
    const config: PoolConfig = {
      connectionString: process.env.DATABASE_URL,
      max: parseInt(process.env.DB_POOL_MAX || "10", 10),
      idleTimeoutMillis: parseInt(process.env.DB_IDLE_TIMEOUT || "30000", 10),
      connectionTimeoutMillis: parseInt(process.env.DB_CONNECT_TIMEOUT || "5000", 10),
      ssl: process.env.DB_SSL === "false"
        ? false
        : { rejectUnauthorized: process.env.DB_SSL_REJECT_UNAUTHORIZED !== "false" },
    };

    pool = new Pool(config);

    pool.on("error", (err: Error) => {
      console.error("[Session Store] Unexpected error on idle client:", err.message);
    });

    console.log("[Session Store] PostgreSQL pool created");
  }
  return pool;
}

export async function query<T extends QueryResultRow = Record<string, unknown>>(
  text: string,
  params?: unknown[],
): Promise<QueryResult<T>> {
  const p = getDatabasePool();
  const start = Date.now();
  const result = await p.query<T>(text, params);
  const duration = Date.now() - start;

  if (duration > 1000) {
    console.warn(`[Session Store] Slow query (${duration}ms):`, text.trim().split("\n")[0]);
  }

  return result;
}

export async function closeDatabasePool(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = undefined;
    console.log("[Session Store] PostgreSQL pool closed");
  }
}
