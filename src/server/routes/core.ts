/**
 * routes/core.ts — Core infrastructure routes.
 *
 * Health and API discovery.
 */

import type { Router } from "express";
import { readFileSync } from "node:fs";
import { resolve, dirname } from "node:path";
import { fileURLToPath } from "node:url";
import type { AppState } from "../app-context.js";
import { log } from "../logger.js";
import { sendOk, createTimeoutMiddleware } from "../envelope.js";
import { createSafeRouter } from "../safe-router.js";
import type { SymbolCounts } from "../stores/symbol-store.js";

// Read version from package.json once at module load
const __dirname = dirname(fileURLToPath(import.meta.url));
const APP_VERSION = (() => {
  const file = resolve(__dirname, "../../../package.json");
  try {
    const pkg: unknown = JSON.parse(readFileSync(file, "utf-8"));
    const version: unknown = typeof pkg === "object" && pkg !== null ? Reflect.get(pkg, "version") : undefined;
    return typeof version === "string" ? version : "unknown";
  } catch (err) {
    log.boot.debug({ err, file }, "package.json not readable, version unknown");
    return "unknown";
  }
})();

type LedgerStatus = ({ active: true } & SymbolCounts) | { active: boolean; error?: "unavailable" };

export interface HealthResponse {
  status: "online" | "initializing";
  retryAfterMs?: number;
  ledger: LedgerStatus;
  upstreams: string[];
}

interface DiscoveryEndpoint {
  method: string;
  path: string;
  description: string;
  params?: Record<string, string>;
}

const ENDPOINTS: DiscoveryEndpoint[] = [
  { method: "GET", path: "/api", description: "API discovery (this endpoint)" },
  { method: "GET", path: "/api/health", description: "Fast health check (returns retryAfterMs when initializing)" },
  { method: "GET", path: "/api/symbols", description: "List ledger entries", params: { skip: ">= 0", limit: "1-1000" } },
  { method: "GET", path: "/:name/:identifier/:filename", description: "Fetch a symbol file (404 while it is being downloaded)" },
  { method: "GET", path: "/download/symbols/:name/:identifier/:filename", description: "Same as above, symbol-server style prefix" },
];

export function createCoreRoutes(appState: AppState): Router {
  const router = createSafeRouter();

  // ─── Health ─────────────────────────────────────────────────

  router.get("/api/health", createTimeoutMiddleware(2000), async (_req, res) => {
    if (!appState.startupComplete) {
      res.setHeader("Retry-After", "2");
    }

    const ledger = async (): Promise<LedgerStatus> => {
      const store = appState.symbolStore;
      if (!store) return { active: false };
      try {
        return { active: true, ...(await store.counts()) };
      } catch (err) {
        log.root.warn({ err }, "Health check: ledger counts failed");
        return { active: true, error: "unavailable" };
      }
    };

    const health: HealthResponse = {
      status: appState.startupComplete ? "online" : "initializing",
      ...(!appState.startupComplete ? { retryAfterMs: 2000 } : {}),
      ledger: await ledger(),
      upstreams: appState.config.upstreams,
    };

    sendOk(res, health);
  });

  // ─── API Discovery ──────────────────────────────────────────

  router.get("/api", (_req, res) => {
    sendOk(res, {
      name: "symcache",
      version: APP_VERSION,
      description: "Caching proxy for debug symbol servers",
      envelope: "JSON responses wrapped in { ok, data, meta } / { ok, error: { code, message, detail?, hints? }, meta }",
      endpoints: ENDPOINTS,
    });
  });

  return router;
}
