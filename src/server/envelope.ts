/**
 * envelope.ts — API response envelope.
 *
 * Consistent response shape for JSON consumers:
 *   Success: { ok: true, data: T, meta: { requestId, timestamp, durationMs } }
 *   Error:   { ok: false, error: { code, message, detail? }, meta: ... }
 *
 * Symbol bytes are streamed raw; only misses and errors on the symbol
 * routes use the error envelope.
 *
 * Usage in routes:
 *   import { sendOk, sendFail, ErrorCode } from "../envelope.js";
 *   sendOk(res, { entries, count: entries.length });
 *   sendFail(res, ErrorCode.INVALID_PARAM, "Invalid identifier", 400);
 */

import { randomUUID, createHash } from "node:crypto";
import type { Request, Response, NextFunction } from "express";
import { log } from "./logger.js";

// ─── Error Codes (stable, machine-readable) ─────────────────────

export const ErrorCode = {
  // 503 — subsystem not ready
  NOT_READY: "NOT_READY",
  LEDGER_NOT_AVAILABLE: "LEDGER_NOT_AVAILABLE",
  // 400 — client errors
  INVALID_PARAM: "INVALID_PARAM",
  NOT_FOUND: "NOT_FOUND",
  // 504 — timeout
  REQUEST_TIMEOUT: "REQUEST_TIMEOUT",
  // 500
  INTERNAL_ERROR: "INTERNAL_ERROR",
} as const;

export type ErrorCodeValue = (typeof ErrorCode)[keyof typeof ErrorCode];

// ─── Meta ───────────────────────────────────────────────────────

export interface ApiMeta {
  requestId: string;
  timestamp: string;
  durationMs: number;
}

// ─── Envelope types (exported for tests) ────────────────────────

export interface ApiSuccess<T = unknown> {
  ok: true;
  data: T;
  meta: ApiMeta;
}

export interface ApiErrorResponse {
  ok: false;
  error: {
    code: string;
    message: string;
    detail?: unknown;
    hints?: string[];
  };
  meta: ApiMeta;
}

export type ApiEnvelope<T = unknown> = ApiSuccess<T> | ApiErrorResponse;

// ─── Middleware: attach requestId + startTime ───────────────────

export function envelopeMiddleware(_req: Request, res: Response, next: NextFunction): void {
  const requestId = randomUUID();

  res.locals._requestId = requestId;
  res.locals._startTime = Date.now();
  res.setHeader("X-Request-Id", requestId);

  next();
}

// ─── Helpers ────────────────────────────────────────────────────

function buildMeta(res: Response): ApiMeta {
  const requestId: unknown = res.locals._requestId;
  const startTime: unknown = res.locals._startTime;
  return {
    requestId: typeof requestId === "string" ? requestId : "unknown",
    timestamp: new Date().toISOString(),
    durationMs: typeof startTime === "number" ? Date.now() - startTime : 0,
  };
}

/** Send a success envelope. */
export function sendOk(res: Response, data: unknown, statusCode = 200): void {
  const envelope: ApiSuccess = { ok: true, data, meta: buildMeta(res) };

  // ETag conditional revalidation for GET requests.
  // Hash only the data portion — meta.timestamp/durationMs change every request.
  if (res.req.method === "GET" && statusCode === 200) {
    const hash = createHash("md5").update(JSON.stringify(data)).digest("base64url").slice(0, 16);
    const etag = `W/"${hash}"`;
    res.setHeader("ETag", etag);
    res.setHeader("Cache-Control", "no-cache");

    if (res.req.headers["if-none-match"] === etag) {
      res.status(304).end();
      return;
    }
  }

  res.status(statusCode).json(envelope);
}

/** Options for extended error details passed to sendFail. */
export interface FailOptions {
  detail?: unknown;
  hints?: string[];
}

/** Send an error envelope. */
export function sendFail(
  res: Response,
  code: ErrorCodeValue,
  message: string,
  statusCode = 400,
  options?: FailOptions,
): void {
  const detail = options?.detail;
  const hints = options?.hints;
  const envelope: ApiErrorResponse = {
    ok: false,
    error: {
      code,
      message,
      ...(detail !== undefined ? { detail } : {}),
      ...(hints?.length ? { hints } : {}),
    },
    meta: buildMeta(res),
  };
  res.status(statusCode).json(envelope);
}

// ─── Timeout Middleware ─────────────────────────────────────────

/**
 * Create a timeout middleware for a specific route.
 * If the request takes longer than `timeoutMs`, returns 504 Gateway Timeout.
 */
export function createTimeoutMiddleware(timeoutMs: number) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const timer = setTimeout(() => {
      if (!res.headersSent) {
        log.http.warn({ requestId: res.locals._requestId, path: req.path, timeoutMs }, "request timeout");
        sendFail(res, ErrorCode.REQUEST_TIMEOUT, `Request timed out after ${Math.round(timeoutMs / 1000)}s`, 504);
      }
    }, timeoutMs);

    const cleanup = () => {
      clearTimeout(timer);
    };
    res.on("finish", cleanup);
    res.on("close", cleanup);

    next();
  };
}

// ─── Catch-all error handler (mount AFTER routes) ───────────────

export function errorHandler(
  err: Error & { status?: number; statusCode?: number },
  req: Request,
  res: Response,
  _next: NextFunction,
): void {
  const internalMessage = err.message || "Internal server error";

  // Streaming responses (symbol bytes) can fail after the headers went out.
  if (res.headersSent) {
    log.http.warn({ err: internalMessage, path: req.path, requestId: res.locals._requestId }, "error after response started");
    res.destroy();
    return;
  }

  const statusCode = err.status || err.statusCode || 500;

  // Log the real error, but sanitize 5xx responses (no file paths or DB strings).
  log.http.error({ err: internalMessage, requestId: res.locals._requestId }, "unhandled error");
  const clientMessage = statusCode >= 500 ? "Internal server error" : internalMessage;
  sendFail(res, ErrorCode.INTERNAL_ERROR, clientMessage, statusCode);
}
