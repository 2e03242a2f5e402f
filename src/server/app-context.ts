/**
 * app-context.ts — Shared state type for the symcache server.
 *
 * Lives outside index.ts so route modules can import it without a cycle.
 */

import type { AppConfig } from "./config.js";
import type { Pool } from "./db.js";
import type { SymbolCache } from "./services/symbols/index.js";
import type { SymbolStore } from "./stores/symbol-store.js";

export interface AppState {
  /** Ledger connection pool (null until boot connects) */
  pool: Pool | null;
  symbolStore: SymbolStore | null;
  symbolCache: SymbolCache | null;
  /** True once reconcile finished; symbol routes answer 503 before that. */
  startupComplete: boolean;
  config: AppConfig;
}
