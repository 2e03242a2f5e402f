/**
 * symbol-store.ts — Symbol ledger (PostgreSQL)
 *
 * One row per (identifier, filename) recording whether a download is running
 * and whether the last one succeeded. Implements the SymbolLedger contract
 * consumed by the cache core, plus listing and counts for the API.
 *
 * Concurrency: claimEntry is a single conditional UPDATE, so two requests
 * racing on the same row cannot both schedule a download.
 */

import { initSchema, type Pool } from "../db.js";
import { log } from "../logger.js";
import type { SymbolEntry, SymbolLedger } from "../services/symbols/ledger.js";
import type { SymbolKey } from "../services/symbols/symbol-key.js";

// ─── Schema ─────────────────────────────────────────────────────

const SCHEMA_STATEMENTS = [
  `CREATE TABLE IF NOT EXISTS symbol_entries (
    id SERIAL PRIMARY KEY,
    name TEXT NOT NULL,
    identifier TEXT NOT NULL,
    filename TEXT NOT NULL,
    in_flight BOOLEAN NOT NULL DEFAULT FALSE,
    found BOOLEAN NOT NULL DEFAULT FALSE,
    created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
    updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
    UNIQUE (identifier, filename)
  )`,
  `CREATE INDEX IF NOT EXISTS idx_symbol_entries_in_flight ON symbol_entries (in_flight)`,
];

// ─── SQL ────────────────────────────────────────────────────────

const SQL = {
  find: `SELECT * FROM symbol_entries WHERE identifier = $1 AND filename = $2`,
  insert: `INSERT INTO symbol_entries (name, identifier, filename, found) VALUES ($1, $2, $3, $4)
    ON CONFLICT (identifier, filename) DO NOTHING
    RETURNING *`,
  update: `UPDATE symbol_entries SET in_flight = $2, found = $3, updated_at = NOW() WHERE id = $1`,
  claim: `UPDATE symbol_entries SET in_flight = TRUE, name = $2, updated_at = NOW()
    WHERE id = $1 AND in_flight = FALSE
    RETURNING id`,
  listInFlight: `SELECT * FROM symbol_entries WHERE in_flight = TRUE ORDER BY id`,
  list: `SELECT * FROM symbol_entries ORDER BY id LIMIT $1 OFFSET $2`,
  countAll: `SELECT COUNT(*) AS n FROM symbol_entries`,
  countFound: `SELECT COUNT(*) AS n FROM symbol_entries WHERE found = TRUE`,
  countInFlight: `SELECT COUNT(*) AS n FROM symbol_entries WHERE in_flight = TRUE`,
};

// ─── Types ──────────────────────────────────────────────────────

export interface SymbolCounts {
  total: number;
  found: number;
  inFlight: number;
}

export interface SymbolStore extends SymbolLedger {
  listEntries(skip: number, limit: number): Promise<SymbolEntry[]>;
  counts(): Promise<SymbolCounts>;
  close(): void;
}

// ─── Helpers ────────────────────────────────────────────────────

function toIso(value: unknown): string {
  return value instanceof Date ? value.toISOString() : String(value);
}

/** Convert a DB row to a SymbolEntry. */
function rowToEntry(row: Record<string, unknown>): SymbolEntry {
  return {
    id: Number(row.id),
    name: String(row.name),
    identifier: String(row.identifier),
    filename: String(row.filename),
    inFlight: row.in_flight === true,
    found: row.found === true,
    createdAt: toIso(row.created_at),
    updatedAt: toIso(row.updated_at),
  };
}

// ─── Factory ────────────────────────────────────────────────────

export async function createSymbolStore(pool: Pool): Promise<SymbolStore> {
  await initSchema(pool, SCHEMA_STATEMENTS);

  log.store.debug("symbol store initialized (pg)");

  async function count(sql: string): Promise<number> {
    const res = await pool.query<{ n: unknown }>(sql);
    return Number(res.rows[0]?.n ?? 0);
  }

  const store: SymbolStore = {
    async findEntry(identifier, filename) {
      const res = await pool.query(SQL.find, [identifier, filename]);
      const row: Record<string, unknown> | undefined = res.rows[0];
      return row ? rowToEntry(row) : null;
    },

    async createEntry(key: SymbolKey, found = false) {
      const res = await pool.query(SQL.insert, [key.name, key.identifier, key.filename, found]);
      const inserted: Record<string, unknown> | undefined = res.rows[0];
      if (inserted) return rowToEntry(inserted);

      // Lost the insert race: return the winner's row.
      const existing = await store.findEntry(key.identifier, key.filename);
      if (!existing) {
        throw new Error(`symbol entry for ${key.identifier}/${key.filename} vanished after insert conflict`);
      }
      return existing;
    },

    async updateEntry(entry) {
      await pool.query(SQL.update, [entry.id, entry.inFlight, entry.found]);
    },

    async claimEntry(entry) {
      const res = await pool.query(SQL.claim, [entry.id, entry.name]);
      const claimed = res.rows.length > 0;
      if (claimed) entry.inFlight = true;
      return claimed;
    },

    async listInFlightEntries() {
      const res = await pool.query(SQL.listInFlight);
      return res.rows.map(rowToEntry);
    },

    async listEntries(skip, limit) {
      const res = await pool.query(SQL.list, [limit, skip]);
      return res.rows.map(rowToEntry);
    },

    async counts() {
      const [total, found, inFlight] = await Promise.all([
        count(SQL.countAll),
        count(SQL.countFound),
        count(SQL.countInFlight),
      ]);
      return { total, found, inFlight };
    },

    close() {
      // Pool lifecycle managed externally
    },
  };

  return store;
}
