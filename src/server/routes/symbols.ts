/**
 * routes/symbols.ts — Symbol download and ledger listing routes.
 *
 *   GET /:name/:identifier/:filename
 *   GET /download/symbols/:name/:identifier/:filename
 *       200 gzip bytes (client accepts gzip) or decompressed bytes;
 *       404 while the symbol is not cached yet (a download may be scheduled);
 *       400 for malformed key components.
 *   GET /api/symbols?skip=0&limit=100
 *       Ledger rows, oldest first.
 *
 * Pattern: factory function createSymbolRoutes(appState) → Router
 */

import type { Request, Response, Router } from "express";
import { pipeline } from "node:stream/promises";
import type { AppState } from "../app-context.js";
import { sendOk, sendFail, ErrorCode } from "../envelope.js";
import { createSafeRouter } from "../safe-router.js";
import { SymbolKeyError, type ResolveResult } from "../services/symbols/index.js";

export const SYMBOL_PATHS = [
  "/download/symbols/:name/:identifier/:filename",
  "/:name/:identifier/:filename",
];

const MAX_LIST_LIMIT = 1000;
const DEFAULT_LIST_LIMIT = 100;

export function acceptsGzip(header: string | undefined): boolean {
  return (header ?? "").toLowerCase().includes("gzip");
}

/** Integer query param; undefined → fallback, anything non-integer → null. */
function queryInt(value: unknown, fallback: number): number | null {
  if (value === undefined) return fallback;
  if (typeof value !== "string" || !/^-?\d+$/.test(value)) return null;
  return Number(value);
}

function sendArtifact(res: Response, file: string): Promise<void> {
  return new Promise((resolve, reject) => {
    res.sendFile(file, { dotfiles: "allow" }, (err) => (err ? reject(err) : resolve()));
  });
}

export function createSymbolRoutes(appState: AppState): Router {
  const router = createSafeRouter();

  // ── Ledger listing ────────────────────────────────────

  router.get("/api/symbols", async (req, res) => {
    const store = appState.symbolStore;
    if (!store) return sendFail(res, ErrorCode.LEDGER_NOT_AVAILABLE, "Symbol ledger not available", 503);

    const skip = queryInt(req.query.skip, 0);
    if (skip === null || skip < 0) {
      return sendFail(res, ErrorCode.INVALID_PARAM, "skip must be a non-negative integer", 400);
    }
    const limit = queryInt(req.query.limit, DEFAULT_LIST_LIMIT);
    if (limit === null || limit < 1 || limit > MAX_LIST_LIMIT) {
      return sendFail(res, ErrorCode.INVALID_PARAM, `limit must be an integer between 1 and ${MAX_LIST_LIMIT}`, 400);
    }

    const entries = await store.listEntries(skip, limit);
    sendOk(res, { entries, count: entries.length, skip, limit });
  });

  // ── Symbol download ───────────────────────────────────

  router.get(SYMBOL_PATHS, async (req: Request, res: Response) => {
    const cache = appState.symbolCache;
    if (!appState.startupComplete || !cache) {
      res.setHeader("Retry-After", "2");
      return sendFail(res, ErrorCode.NOT_READY, "Symbol cache is starting up", 503);
    }

    const key = {
      name: req.params.name,
      identifier: req.params.identifier,
      filename: req.params.filename,
    };

    let result: ResolveResult;
    try {
      result = await cache.resolve(key, acceptsGzip(req.headers["accept-encoding"]));
    } catch (err) {
      if (err instanceof SymbolKeyError) {
        return sendFail(res, ErrorCode.INVALID_PARAM, err.message, 400, { detail: { field: err.field } });
      }
      throw err;
    }

    if (result.kind === "miss") {
      return sendFail(res, ErrorCode.NOT_FOUND, "Symbol not cached yet", 404, {
        detail: { scheduled: result.scheduled },
        hints: ["Retry the request once the download has finished"],
      });
    }

    res.setHeader("Content-Type", "application/octet-stream");
    if (result.encoding === "gzip") {
      res.setHeader("Content-Encoding", "gzip");
      await sendArtifact(res, result.path);
      return;
    }
    await pipeline(result.stream, res);
  });

  return router;
}
