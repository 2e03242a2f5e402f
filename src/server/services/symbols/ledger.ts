/**
 * ledger.ts — The narrow ledger contract the cache core depends on.
 *
 * The PostgreSQL implementation lives in stores/symbol-store.ts; tests
 * substitute an in-memory one.
 */

import type { SymbolKey } from "./symbol-key.js";

/** One ledger row per (identifier, filename). */
export interface SymbolEntry extends SymbolKey {
  id: number;
  /** A background fetch is running (or was, before a crash). */
  inFlight: boolean;
  /** The last fetch published an artifact, or one was found on disk. */
  found: boolean;
  createdAt: string;
  updatedAt: string;
}

export interface SymbolLedger {
  findEntry(identifier: string, filename: string): Promise<SymbolEntry | null>;
  /** Insert a row for `key`, or return the existing one if another request won the insert. */
  createEntry(key: SymbolKey, found?: boolean): Promise<SymbolEntry>;
  /** Persist `inFlight` and `found`. */
  updateEntry(entry: SymbolEntry): Promise<void>;
  listInFlightEntries(): Promise<SymbolEntry[]>;
  /**
   * Atomically flip `inFlight` from false to true and record `entry.name`
   * as the name being fetched (the row is shared by every name with the
   * same identifier and filename).
   * Returns false when another caller already holds the row; on success
   * `entry.inFlight` is set to true.
   */
  claimEntry(entry: SymbolEntry): Promise<boolean>;
}
