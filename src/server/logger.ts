/**
 * logger.ts — Structured Logging for symcache
 *
 * Built on pino — the Node.js structured logging standard.
 *
 * Configuration (resolved by config.ts):
 *   SYMCACHE_LOG_LEVEL  — Minimum log level (default: "info", dev: "debug")
 *   SYMCACHE_LOG_PRETTY — Force pretty-print (auto-detected from NODE_ENV)
 *   SYMCACHE_DEBUG      — "true" sets level to "debug"
 *
 * Usage:
 *   import { log } from "./logger.js";
 *   log.boot.info("server starting");
 *   log.transfer.debug({ identifier, percent: 45 }, "downloading");
 *   log.upstream.warn({ err }, "network error");
 *
 * Subsystem loggers:
 *   log.boot, log.http, log.cache, log.upstream, log.transfer, log.store
 */

import pino from "pino";
import type { Logger } from "pino";
import { resolveConfig } from "./config.js";

// ─── Configuration ──────────────────────────────────────────────

const config = resolveConfig();

/** Build pino transport configuration */
function resolveTransport(): pino.TransportSingleOptions | undefined {
  if (!config.logPretty) return undefined;
  return {
    target: "pino-pretty",
    options: {
      colorize: true,
      translateTime: "HH:MM:ss.l",
      ignore: "pid,hostname",
    },
  };
}

// ─── Root Logger ────────────────────────────────────────────────

const level = config.logLevel;
const transport = resolveTransport();

/**
 * Map pino numeric levels to GCP Cloud Logging severity strings.
 * @see https://cloud.google.com/logging/docs/reference/v2/rest/v2/LogEntry#LogSeverity
 */
const PINO_TO_GCP_SEVERITY: Record<number, string> = {
  10: "DEBUG",    // trace
  20: "DEBUG",    // debug
  30: "INFO",     // info
  40: "WARNING",  // warn
  50: "ERROR",    // error
  60: "CRITICAL", // fatal
};

/** Whether to emit GCP-compatible JSON (production = no pino-pretty). */
const GCP_FORMAT = !config.isTest && !transport;

export const rootLogger: Logger = pino({
  level,
  ...(transport ? { transport } : {}),
  ...(GCP_FORMAT ? { messageKey: "message" } : {}),
  base: { service: "symcache" },
  timestamp: pino.stdTimeFunctions.isoTime,
  formatters: {
    ...(GCP_FORMAT
      ? {
          level(label: string, number: number) {
            return { severity: PINO_TO_GCP_SEVERITY[number] || label.toUpperCase(), level: number };
          },
        }
      : {}),
  },
});

// ─── Subsystem Child Loggers ────────────────────────────────────

/**
 * Subsystem loggers — each adds a `subsystem` field to every log line.
 *
 * Usage: log.cache.info("reconcile complete")
 *   → { level: 30, subsystem: "cache", msg: "reconcile complete", ... }
 */
export const log = {
  /** Boot/startup sequence */
  boot: rootLogger.child({ subsystem: "boot" }),
  /** HTTP/API layer */
  http: rootLogger.child({ subsystem: "http" }),
  /** Cache coordinator: hit/miss, scheduling, reconcile */
  cache: rootLogger.child({ subsystem: "cache" }),
  /** Upstream symbol servers */
  upstream: rootLogger.child({ subsystem: "upstream" }),
  /** Streaming downloads into the artifact store */
  transfer: rootLogger.child({ subsystem: "transfer" }),
  /** Ledger and artifact storage */
  store: rootLogger.child({ subsystem: "store" }),
  /** Root logger (for one-off use) */
  root: rootLogger,
};

export type { Logger };
