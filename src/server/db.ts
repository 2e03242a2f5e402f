/**
 * db.ts — PostgreSQL connection layer
 *
 * The symbol ledger is the only shared mutable resource across concurrent
 * downloads. Single-row read-modify-write goes through conditional UPDATEs
 * in the store; this module only owns pools, health and schema init.
 *
 * Pattern:
 *   const pool = createPool(config.databaseUrl);
 *   const store = await createSymbolStore(pool);
 *   await pool.end();
 */

import pg from "pg";
import { log } from "./logger.js";
const { Pool } = pg;
type Pool = pg.Pool;

export type { Pool };

/** Create a connection pool for `connectionString` (AppConfig.databaseUrl). */
export function createPool(connectionString: string): Pool {
  const pool = new Pool({
    connectionString,
    // Background downloads each hold a client only for single statements.
    max: 20,
    connectionTimeoutMillis: 5000,
    idleTimeoutMillis: 30000,
    statement_timeout: 30000,
  });

  // Must handle pool error events — unhandled idle-client errors crash the process
  pool.on("error", (err) => {
    log.store.error({ err: err.message }, "pg pool idle client error");
  });

  return pool;
}

/**
 * Verify pool connectivity with a trivial query.
 * Returns true on success, false on failure.
 */
export async function healthCheck(pool: Pool): Promise<boolean> {
  try {
    const client = await pool.connect();
    try {
      await client.query("SELECT 1");
      return true;
    } finally {
      client.release();
    }
  } catch (err) {
    log.store.warn({ err: err instanceof Error ? err.message : String(err) }, "pg health check failed");
    return false;
  }
}

/**
 * Run a sequence of DDL statements inside a single transaction.
 * Used by stores during schema initialization.
 */
export async function initSchema(
  pool: Pool,
  statements: string[],
): Promise<void> {
  const client = await pool.connect();
  try {
    await client.query("BEGIN");
    for (const stmt of statements) {
      await client.query(stmt);
    }
    await client.query("COMMIT");
  } catch (e) {
    await client.query("ROLLBACK");
    throw e;
  } finally {
    client.release();
  }
}
