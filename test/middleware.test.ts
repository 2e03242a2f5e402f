/**
 * middleware.test.ts — Envelope, timeout and error-handler middleware.
 *
 * Tests:
 * - Request ID present on all responses
 * - sendOk / sendFail envelope shape, ETag revalidation
 * - Timeout fires and returns 504 with error envelope
 * - Unhandled errors caught and wrapped with request ID
 * - Errors after a streamed response started close the socket
 */

import { describe, it, expect } from "vitest";
import request from "supertest";
import express from "express";
import {
  envelopeMiddleware,
  errorHandler,
  createTimeoutMiddleware,
  ErrorCode,
  sendFail,
  sendOk,
} from "../src/server/envelope.js";
import { createSafeRouter } from "../src/server/safe-router.js";

function buildApp() {
  const app = express();
  app.use(envelopeMiddleware);
  return app;
}

// ─── Request ID ─────────────────────────────────────────────────

describe("Request ID middleware", () => {
  it("attaches a unique UUID request ID to every response", async () => {
    const app = buildApp();
    app.get("/test", (_req, res) => sendOk(res, {}));

    const res1 = await request(app).get("/test");
    const res2 = await request(app).get("/test");

    const uuidV4 = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/i;
    expect(res1.headers["x-request-id"]).toMatch(uuidV4);
    expect(res1.headers["x-request-id"]).not.toBe(res2.headers["x-request-id"]);
    expect(res1.body.meta.requestId).toBe(res1.headers["x-request-id"]);
  });
});

// ─── Envelope helpers ───────────────────────────────────────────

describe("sendOk / sendFail", () => {
  it("wraps data in { ok, data, meta }", async () => {
    const app = buildApp();
    app.get("/test", (_req, res) => sendOk(res, { answer: 42 }));

    const res = await request(app).get("/test");
    expect(res.status).toBe(200);
    expect(res.body.ok).toBe(true);
    expect(res.body.data).toEqual({ answer: 42 });
    expect(typeof res.body.meta.durationMs).toBe("number");
  });

  it("answers 304 when If-None-Match matches the ETag", async () => {
    const app = buildApp();
    app.get("/test", (_req, res) => sendOk(res, { stable: true }));

    const first = await request(app).get("/test");
    const etag = first.headers["etag"];
    expect(etag).toMatch(/^W\/"/);

    const second = await request(app).get("/test").set("If-None-Match", String(etag));
    expect(second.status).toBe(304);
  });

  it("includes detail and hints only when given", async () => {
    const app = buildApp();
    app.get("/bare", (_req, res) => sendFail(res, ErrorCode.NOT_FOUND, "gone", 404));
    app.get("/full", (_req, res) =>
      sendFail(res, ErrorCode.INVALID_PARAM, "bad", 400, { detail: { field: "name" }, hints: ["fix it"] }),
    );

    const bare = await request(app).get("/bare");
    expect(bare.status).toBe(404);
    expect(bare.body.error).toEqual({ code: "NOT_FOUND", message: "gone" });

    const full = await request(app).get("/full");
    expect(full.body.error).toEqual({
      code: "INVALID_PARAM",
      message: "bad",
      detail: { field: "name" },
      hints: ["fix it"],
    });
  });
});

// ─── Timeout ────────────────────────────────────────────────────

describe("Timeout middleware", () => {
  it("allows requests that complete before timeout", async () => {
    const app = buildApp();
    app.get("/fast", createTimeoutMiddleware(1000), (_req, res) => sendOk(res, { completed: true }));

    const res = await request(app).get("/fast");
    expect(res.status).toBe(200);
    expect(res.body.data.completed).toBe(true);
  });

  it("returns 504 when the request exceeds the timeout", async () => {
    const app = buildApp();
    const router = createSafeRouter();
    router.get("/slow", createTimeoutMiddleware(600), async (_req, res) => {
      await new Promise((r) => setTimeout(r, 1000));
      if (!res.headersSent) sendOk(res, { completed: true });
    });
    app.use(router);

    const res = await request(app).get("/slow");
    expect(res.status).toBe(504);
    expect(res.body.error.code).toBe(ErrorCode.REQUEST_TIMEOUT);
    expect(res.body.error.message).toBe("Request timed out after 1s");
    expect(res.headers["x-request-id"]).toBe(res.body.meta.requestId);
  });
});

// ─── Error handler ──────────────────────────────────────────────

describe("Error handler middleware", () => {
  it("sanitizes 5xx messages", async () => {
    const app = buildApp();
    app.get("/boom", () => {
      throw new Error("connection to 10.0.0.1 refused");
    });
    app.use(errorHandler);

    const res = await request(app).get("/boom");
    expect(res.status).toBe(500);
    expect(res.body.error).toEqual({ code: "INTERNAL_ERROR", message: "Internal server error" });
    expect(res.body.meta.requestId).toBe(res.headers["x-request-id"]);
  });

  it("respects statusCode on errors", async () => {
    const app = buildApp();
    app.get("/teapot", () => {
      throw Object.assign(new Error("short and stout"), { statusCode: 418 });
    });
    app.use(errorHandler);

    const res = await request(app).get("/teapot");
    expect(res.status).toBe(418);
    expect(res.body.error.message).toBe("short and stout");
  });

  it("destroys the socket when an error follows a started response", async () => {
    const app = buildApp();
    const router = createSafeRouter();
    router.get("/partial", async (_req, res) => {
      res.setHeader("Content-Type", "application/octet-stream");
      res.write(Buffer.from("half"));
      throw new Error("stream broke");
    });
    app.use(router);
    app.use(errorHandler);

    await expect(request(app).get("/partial")).rejects.toThrow();
  });
});
