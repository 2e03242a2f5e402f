/**
 * safe-router.ts — Async-safe Express router
 *
 * Express 4 does NOT catch rejected promises from async route handlers.
 * A bare `router.get("/x", async (req, res) => { throw … })` hangs the
 * request with no response.
 *
 * createSafeRouter() wraps every handler passed to a verb method: sync
 * throws and promise rejections both go to `next(err)`, and from there to
 * the catch-all errorHandler (envelope.ts).
 *
 * Usage:
 *   const router = createSafeRouter();
 *   router.get("/api/foo", async (req, res) => { … }); // always safe
 */

import { Router } from "express";
import type { Request, Response, NextFunction } from "express";

const HTTP_METHODS = ["get", "post", "put", "patch", "delete", "all", "head", "options"] as const;

export function createSafeRouter(): Router {
  const router = Router();

  for (const method of HTTP_METHODS) {
    const original: unknown = Reflect.get(router, method);
    if (typeof original !== "function") continue;

    Reflect.set(router, method, (...args: unknown[]) => {
      // Path strings and RegExps pass through; functions (or arrays of them) get wrapped.
      const safe = args.map((arg) => (Array.isArray(arg) ? arg.map(wrapIfHandler) : wrapIfHandler(arg)));
      return Reflect.apply(original, router, safe);
    });
  }

  return router;
}

// ─── Internal ───────────────────────────────────────────────

function wrapIfHandler(handler: unknown): unknown {
  if (typeof handler !== "function") return handler;
  // Express detects error middleware by arity; leave those untouched.
  if (handler.length === 4) return handler;

  return function safeHandler(req: Request, res: Response, next: NextFunction): void {
    try {
      const result: unknown = Reflect.apply(handler, undefined, [req, res, next]);
      if (result instanceof Promise) {
        result.catch((err: unknown) => {
          next(err instanceof Error ? err : new Error(String(err)));
        });
      }
    } catch (syncErr) {
      next(syncErr instanceof Error ? syncErr : new Error(String(syncErr)));
    }
  };
}
