/**
 * upstream-client.ts — Streaming GET against one upstream symbol server.
 *
 * Built on node:http / node:https rather than fetch: fetch transparently
 * decodes Content-Encoding, and gzip bodies from upstream are stored
 * verbatim, so the raw bytes are needed.
 *
 * Retry policy (per upstream URL):
 *   - idempotent methods only (GET, HEAD, OPTIONS)
 *   - statuses 429, 500, 502, 503, 504 and transport errors
 *   - `maxAttempts` attempts in total, exponential backoff from `backoffMs`
 *   - `timeoutMs` of socket inactivity per attempt
 * Redirects are followed up to MAX_REDIRECTS hops.
 */

import * as http from "node:http";
import * as https from "node:https";
import type { Readable } from "node:stream";
import { log } from "../../logger.js";

// ─── Types ──────────────────────────────────────────────────────

export interface UpstreamResponse {
  status: number;
  /** Lower-cased header names; repeated headers joined with ", ". */
  headers: Record<string, string | undefined>;
  /** Raw, undecoded body. Destroy it when not consumed. */
  body: Readable;
}

export interface UpstreamRequestOptions {
  method: string;
  timeoutMs: number;
}

/** One HTTP exchange, redirects included. Swappable in tests. */
export type UpstreamTransport = (url: string, options: UpstreamRequestOptions) => Promise<UpstreamResponse>;

export interface RetryPolicy {
  maxAttempts: number;
  backoffMs: number;
  timeoutMs: number;
}

export interface UpstreamClient {
  get(url: string): Promise<UpstreamResponse>;
}

/** Transport-level failure: DNS, connect, reset, timeout, redirect loop. */
export class UpstreamError extends Error {
  constructor(
    message: string,
    readonly url: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "UpstreamError";
  }
}

// ─── Constants ──────────────────────────────────────────────────

export const RETRYABLE_STATUS = new Set([429, 500, 502, 503, 504]);
export const IDEMPOTENT_METHODS = new Set(["GET", "HEAD", "OPTIONS"]);
const REDIRECT_STATUS = new Set([301, 302, 303, 307, 308]);
const MAX_REDIRECTS = 5;
const USER_AGENT = "symcache/0.1";

// ─── Transport ──────────────────────────────────────────────────

function flattenHeaders(raw: http.IncomingHttpHeaders): Record<string, string | undefined> {
  const out: Record<string, string | undefined> = {};
  for (const [name, value] of Object.entries(raw)) {
    out[name.toLowerCase()] = Array.isArray(value) ? value.join(", ") : value;
  }
  return out;
}

function requestOnce(url: string, options: UpstreamRequestOptions): Promise<UpstreamResponse> {
  const target = new URL(url);
  if (target.protocol !== "http:" && target.protocol !== "https:") {
    return Promise.reject(new UpstreamError(`Unsupported protocol ${target.protocol}`, url));
  }
  const requestOptions: http.RequestOptions = {
    method: options.method,
    headers: { "accept-encoding": "gzip", "user-agent": USER_AGENT },
  };

  return new Promise((resolve, reject) => {
    const onResponse = (res: http.IncomingMessage): void => {
      resolve({ status: res.statusCode ?? 0, headers: flattenHeaders(res.headers), body: res });
    };
    const req =
      target.protocol === "https:"
        ? https.request(target, requestOptions, onResponse)
        : http.request(target, requestOptions, onResponse);
    // Socket inactivity: covers connect, headers and every body read.
    req.setTimeout(options.timeoutMs, () => {
      req.destroy(new UpstreamError(`No data from upstream for ${options.timeoutMs}ms`, url));
    });
    req.on("error", (err) => {
      reject(err instanceof UpstreamError ? err : new UpstreamError(err.message, url, { cause: err }));
    });
    req.end();
  });
}

/** Default transport: raw HTTP(S) request following redirects. */
export async function httpGet(url: string, options: UpstreamRequestOptions): Promise<UpstreamResponse> {
  let current = url;
  for (let hop = 0; hop <= MAX_REDIRECTS; hop++) {
    const res = await requestOnce(current, options);
    const location = res.headers.location;
    if (!REDIRECT_STATUS.has(res.status) || !location) {
      return res;
    }
    res.body.destroy();
    current = new URL(location, current).toString();
    log.upstream.debug({ from: url, to: current, status: res.status }, "following redirect");
  }
  throw new UpstreamError(`More than ${MAX_REDIRECTS} redirects`, url);
}

// ─── Retry ──────────────────────────────────────────────────────

/** Delay before the attempt that follows `attempt` (1-based). */
export function backoffDelay(backoffMs: number, attempt: number): number {
  return backoffMs * Math.pow(2, attempt - 1);
}

/**
 * Issue `method` against `url`, retrying per `policy`.
 * When attempts run out on a retryable status the last response is returned;
 * when they run out on a transport error that error is thrown.
 */
export async function requestWithRetry(
  transport: UpstreamTransport,
  url: string,
  policy: RetryPolicy,
  method = "GET",
): Promise<UpstreamResponse> {
  const attempts = IDEMPOTENT_METHODS.has(method) ? Math.max(1, policy.maxAttempts) : 1;

  for (let attempt = 1; ; attempt++) {
    const last = attempt >= attempts;
    try {
      const res = await transport(url, { method, timeoutMs: policy.timeoutMs });
      if (last || !RETRYABLE_STATUS.has(res.status)) {
        return res;
      }
      res.body.destroy();
      log.upstream.debug({ url, status: res.status, attempt }, "retryable status");
    } catch (err) {
      if (last) throw err;
      log.upstream.debug({ url, attempt, err: err instanceof Error ? err.message : String(err) }, "transport error, retrying");
    }
    const delay = backoffDelay(policy.backoffMs, attempt);
    if (delay > 0) {
      await new Promise((r) => setTimeout(r, delay));
    }
  }
}

export function createUpstreamClient(policy: RetryPolicy, transport: UpstreamTransport = httpGet): UpstreamClient {
  return {
    get(url) {
      return requestWithRetry(transport, url, policy, "GET");
    },
  };
}
