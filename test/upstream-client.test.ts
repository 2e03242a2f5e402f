/**
 * upstream-client.test.ts — Retry policy and the raw HTTP transport.
 *
 * Retry tests use a scripted transport; transport tests run a real
 * node:http server on 127.0.0.1 with an ephemeral port.
 */

import { describe, it, expect, beforeAll, afterAll, vi } from "vitest";
import * as http from "node:http";
import { gzipSync } from "node:zlib";
import {
  backoffDelay,
  createUpstreamClient,
  httpGet,
  requestWithRetry,
  UpstreamError,
  type UpstreamTransport,
} from "../src/server/services/symbols/upstream-client.js";
import { createFakeUpstream } from "./helpers/fake-upstream.js";

const URL_A = "http://upstream.test/app.pdb/ABC/app.pdb";
const POLICY = { maxAttempts: 3, backoffMs: 0, timeoutMs: 1000 };

async function readBody(body: AsyncIterable<unknown>): Promise<Buffer> {
  const parts: Buffer[] = [];
  for await (const chunk of body) {
    if (Buffer.isBuffer(chunk)) parts.push(chunk);
  }
  return Buffer.concat(parts);
}

// ─── Retry policy ───────────────────────────────────────────

describe("backoffDelay", () => {
  it("doubles from the base delay", () => {
    expect([1, 2, 3].map((attempt) => backoffDelay(300, attempt))).toEqual([300, 600, 1200]);
  });
});

describe("requestWithRetry", () => {
  it("returns the first non-retryable response without retrying", async () => {
    const upstream = createFakeUpstream();
    upstream.reply(URL_A, { status: 404 });

    const res = await requestWithRetry(upstream.transport, URL_A, POLICY);
    expect(res.status).toBe(404);
    expect(upstream.callsTo(URL_A)).toBe(1);
  });

  it("retries retryable statuses until success", async () => {
    const upstream = createFakeUpstream();
    upstream.reply(URL_A, { status: 503 }, { status: 502 }, { status: 200, body: Buffer.from("ok") });

    const res = await requestWithRetry(upstream.transport, URL_A, POLICY);
    expect(res.status).toBe(200);
    expect((await readBody(res.body)).toString()).toBe("ok");
    expect(upstream.callsTo(URL_A)).toBe(3);
  });

  it("returns the last retryable response when attempts run out", async () => {
    const upstream = createFakeUpstream();
    upstream.reply(URL_A, { status: 429 });

    const res = await requestWithRetry(upstream.transport, URL_A, POLICY);
    expect(res.status).toBe(429);
    expect(upstream.callsTo(URL_A)).toBe(3);
  });

  it("retries transport errors and rethrows the last one", async () => {
    const upstream = createFakeUpstream();
    upstream.reply(URL_A, { status: 0, error: new UpstreamError("connect ECONNREFUSED", URL_A) });

    await expect(requestWithRetry(upstream.transport, URL_A, POLICY)).rejects.toThrow("connect ECONNREFUSED");
    expect(upstream.callsTo(URL_A)).toBe(3);
  });

  it("does not retry non-idempotent methods", async () => {
    const upstream = createFakeUpstream();
    upstream.reply(URL_A, { status: 503 });

    const res = await requestWithRetry(upstream.transport, URL_A, POLICY, "POST");
    expect(res.status).toBe(503);
    expect(upstream.callsTo(URL_A)).toBe(1);
  });

  it("makes at least one attempt when maxAttempts is below 1", async () => {
    const upstream = createFakeUpstream();
    upstream.reply(URL_A, { status: 503 });

    await requestWithRetry(upstream.transport, URL_A, { ...POLICY, maxAttempts: 0 });
    expect(upstream.callsTo(URL_A)).toBe(1);
  });

  it("passes method and timeout to the transport", async () => {
    const upstream = createFakeUpstream();
    const spy = vi.fn<UpstreamTransport>(upstream.transport);

    await requestWithRetry(spy, URL_A, { ...POLICY, timeoutMs: 1234 });
    expect(spy).toHaveBeenCalledWith(URL_A, { method: "GET", timeoutMs: 1234 });
  });

  it("waits backoffMs * 2^(attempt-1) between attempts", async () => {
    vi.useFakeTimers();
    try {
      const upstream = createFakeUpstream();
      upstream.reply(URL_A, { status: 500 }, { status: 500 }, { status: 200 });

      const pending = requestWithRetry(upstream.transport, URL_A, { ...POLICY, backoffMs: 100 });
      await vi.advanceTimersByTimeAsync(99);
      expect(upstream.callsTo(URL_A)).toBe(1);
      await vi.advanceTimersByTimeAsync(1);
      expect(upstream.callsTo(URL_A)).toBe(2);
      await vi.advanceTimersByTimeAsync(199);
      expect(upstream.callsTo(URL_A)).toBe(2);
      await vi.advanceTimersByTimeAsync(1);

      expect((await pending).status).toBe(200);
      expect(upstream.callsTo(URL_A)).toBe(3);
    } finally {
      vi.useRealTimers();
    }
  });
});

describe("createUpstreamClient", () => {
  it("issues retrying GETs through the transport", async () => {
    const upstream = createFakeUpstream();
    upstream.reply(URL_A, { status: 504 }, { status: 200 });

    const client = createUpstreamClient(POLICY, upstream.transport);
    expect((await client.get(URL_A)).status).toBe(200);
    expect(upstream.callsTo(URL_A)).toBe(2);
  });
});

// ─── httpGet against a local server ─────────────────────────

describe("httpGet", () => {
  const gz = gzipSync(Buffer.from("compressed on the wire"));
  let server: http.Server;
  let base: string;
  const seen: http.IncomingHttpHeaders[] = [];

  beforeAll(async () => {
    server = http.createServer((req, res) => {
      seen.push(req.headers);
      switch (req.url) {
        case "/plain":
          res.writeHead(200, { "Content-Length": "5" });
          res.end("hello");
          return;
        case "/gzip":
          res.writeHead(200, { "Content-Encoding": "gzip", "Content-Length": String(gz.length) });
          res.end(gz);
          return;
        case "/hop":
          res.writeHead(302, { Location: "/plain" });
          res.end();
          return;
        case "/loop":
          res.writeHead(301, { Location: "/loop" });
          res.end();
          return;
        case "/stall":
          res.writeHead(200, { "Content-Length": "10" });
          res.write("12345");
          return;
        default:
          res.writeHead(404);
          res.end();
      }
    });
    await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
    const address = server.address();
    if (address === null || typeof address === "string") throw new Error("server not listening on TCP");
    base = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  const options = { method: "GET", timeoutMs: 2000 };

  it("returns status, lower-cased headers and the body", async () => {
    const res = await httpGet(`${base}/plain`, options);
    expect(res.status).toBe(200);
    expect(res.headers["content-length"]).toBe("5");
    expect((await readBody(res.body)).toString()).toBe("hello");
  });

  it("asks for gzip and hands the encoded bytes through untouched", async () => {
    const res = await httpGet(`${base}/gzip`, options);
    expect(seen[seen.length - 1]?.["accept-encoding"]).toBe("gzip");
    expect(res.headers["content-encoding"]).toBe("gzip");
    expect(await readBody(res.body)).toEqual(gz);
  });

  it("follows redirects", async () => {
    const res = await httpGet(`${base}/hop`, options);
    expect(res.status).toBe(200);
    expect((await readBody(res.body)).toString()).toBe("hello");
  });

  it("gives up after too many redirects", async () => {
    await expect(httpGet(`${base}/loop`, options)).rejects.toThrow("More than 5 redirects");
  });

  it("returns non-200 responses as-is", async () => {
    const res = await httpGet(`${base}/missing`, options);
    expect(res.status).toBe(404);
    res.body.destroy();
  });

  it("fails a body that stops arriving for longer than the timeout", async () => {
    const res = await httpGet(`${base}/stall`, { method: "GET", timeoutMs: 100 });
    await expect(readBody(res.body)).rejects.toThrow();
  });

  it("wraps connection failures in UpstreamError", async () => {
    // Port 1 on loopback refuses connections.
    await expect(httpGet("http://127.0.0.1:1/x", options)).rejects.toBeInstanceOf(UpstreamError);
  });

  it("rejects non-http protocols", async () => {
    await expect(httpGet("ftp://127.0.0.1/x", options)).rejects.toThrow("Unsupported protocol ftp:");
  });
});
