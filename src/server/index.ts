/**
 * index.ts — symcache Express server (thin shell)
 *
 * Caching proxy in front of public debug-symbol servers. A request for a
 * symbol that is not cached yet answers 404 and schedules one background
 * download; later requests are served from the local artifact store.
 *
 * This file is the minimal app factory + boot sequence.
 * Route handlers live in src/server/routes/*.ts.
 *
 * Endpoints:
 *   GET /api                                          — API discovery
 *   GET /api/health                                   — Status check
 *   GET /api/symbols                                  — Ledger listing
 *   GET /:name/:identifier/:filename                  — Symbol bytes
 *   GET /download/symbols/:name/:identifier/:filename — Symbol bytes
 */

import express from "express";
import compression from "compression";
import type { IncomingMessage, Server } from "node:http";
import { pinoHttp } from "pino-http";
import { log, rootLogger } from "./logger.js";
import { createPool, healthCheck } from "./db.js";
import { createSymbolStore } from "./stores/symbol-store.js";
import { createSymbolCacheFromConfig } from "./services/symbols/index.js";

// Shared types (avoids circular deps between index ↔ routes)
import type { AppState } from "./app-context.js";

import { resolveConfig } from "./config.js";
import { envelopeMiddleware, errorHandler } from "./envelope.js";

// Route modules
import { createCoreRoutes } from "./routes/core.js";
import { createSymbolRoutes } from "./routes/symbols.js";

// Re-export for test compatibility
export type { AppState };

// ─── Module-level state ─────────────────────────────────────────
const state: AppState = {
  pool: null,
  symbolStore: null,
  symbolCache: null,
  startupComplete: false,
  config: resolveConfig(),
};
let server: Server | null = null;

// ─── App Factory ────────────────────────────────────────────────
export function createApp(appState: AppState): express.Express {
  const app = express();

  app.set("trust proxy", 1);

  // requestId + timing on every request
  app.use(envelopeMiddleware);

  // JSON responses only: symbol bytes are octet-stream or already gzip-encoded
  app.use(compression());

  // Structured HTTP request logging
  app.use(
    pinoHttp({
      logger: rootLogger,
      autoLogging: {
        ignore: (req: IncomingMessage) => (req.url ?? "").startsWith("/favicon"),
      },
    }),
  );

  // ─── Mount route modules ──────────────────────────────────
  // /api/* first: the symbol route's three-segment pattern would shadow it.
  app.use(createCoreRoutes(appState));
  app.use(createSymbolRoutes(appState));

  app.use(errorHandler);

  return app;
}

// ─── Startup ────────────────────────────────────────────────────
async function boot(): Promise<void> {
  log.boot.info({ symbolPath: state.config.symbolPath, upstreams: state.config.upstreams }, "symcache initializing");

  const pool = createPool(state.config.databaseUrl);
  state.pool = pool;
  log.boot.info({ url: state.config.databaseUrl.replace(/\/\/.*@/, "//<redacted>@") }, "pool created");
  if (!(await healthCheck(pool))) {
    throw new Error("symbol ledger database is not reachable");
  }

  const store = await createSymbolStore(pool);
  state.symbolStore = store;
  const counts = await store.counts();
  log.boot.info(counts, "symbol ledger online");

  const cache = createSymbolCacheFromConfig(state.config, store);
  state.symbolCache = cache;

  // Entries left in flight by a previous process would otherwise block their key forever.
  const summary = await cache.reconcile();
  log.boot.info(summary, "startup reconciliation complete");

  state.startupComplete = true;

  const app = createApp(state);
  server = app.listen(state.config.port, () => {
    log.boot.info({ port: state.config.port, url: `http://localhost:${state.config.port}` }, "symcache online");
  });
}

// ─── Graceful Shutdown ──────────────────────────────────────────

/** Stop accepting requests, let scheduled fetches settle, then release the ledger. */
export async function stopServices(appState: AppState, listener: Server | null): Promise<void> {
  appState.startupComplete = false;
  if (listener) {
    await new Promise<void>((resolve, reject) => {
      listener.close((err) => (err ? reject(err) : resolve()));
    });
  }
  if (appState.symbolCache) {
    await appState.symbolCache.drain();
  }
  appState.symbolStore?.close();
  if (appState.pool) {
    await appState.pool.end();
  }
}

async function shutdown(): Promise<void> {
  log.boot.info("symcache shutting down");
  await stopServices(state, server);
  process.exit(0);
}

function onSignal(): void {
  shutdown().catch((err) => {
    log.boot.error({ err: err instanceof Error ? err.message : String(err) }, "shutdown failed");
    process.exit(1);
  });
}

// ─── Launch (guarded for test imports) ──────────────────────────
if (!state.config.isTest) {
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);

  boot().catch((err) => {
    log.boot.fatal({ err: err instanceof Error ? err.message : String(err) }, "fatal startup error");
    process.exit(1);
  });
}
