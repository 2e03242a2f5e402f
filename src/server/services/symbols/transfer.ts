/**
 * transfer.ts — Stream one upstream 200 response into the artifact store.
 *
 * All file work for a key runs under that key's lock. The body is read in
 * slices of at most `chunkSize` until the declared size has arrived, the
 * sink is flushed whenever more than `maxMemoryBytes` went unflushed, and
 * progress is logged at each 5% boundary.
 */

import { log } from "../../logger.js";
import type { ArtifactStore } from "./artifact-store.js";
import type { KeyedLock } from "./keyed-lock.js";
import type { SymbolEntry, SymbolLedger } from "./ledger.js";
import { describeKey, toSymbolKey, type SymbolKey } from "./symbol-key.js";
import type { UpstreamResponse } from "./upstream-client.js";

// ─── Types ──────────────────────────────────────────────────────

export interface TransferOptions {
  chunkSize: number;
  maxMemoryBytes: number;
}

export interface TransferEngine {
  /** Publish the artifact for `entry` from `response`. Throws TransferError. */
  stream(entry: SymbolEntry, response: UpstreamResponse): Promise<void>;
}

/** A 200 response could not be turned into an artifact. */
export class TransferError extends Error {
  constructor(
    message: string,
    readonly key: SymbolKey,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "TransferError";
  }
}

// ─── Header helpers ─────────────────────────────────────────────

/** Checked in order; GCS reports the stored size under its own name. */
export const SIZE_HEADERS = ["content-length", "x-goog-stored-content-length"] as const;

export function declaredSize(headers: Record<string, string | undefined>): number | null {
  for (const name of SIZE_HEADERS) {
    const raw = headers[name]?.trim();
    if (raw && /^\d+$/.test(raw)) {
      return Number(raw);
    }
  }
  return null;
}

export function isGzipEncoded(headers: Record<string, string | undefined>): boolean {
  return (headers["content-encoding"] ?? "").toLowerCase().includes("gzip");
}

// ─── Streaming helpers ──────────────────────────────────────────

/**
 * Yield slices of at most `chunkSize` bytes until `limit` bytes were seen.
 * Bytes past `limit` are ignored; a body shorter than `limit` throws.
 */
export async function* readBounded(
  body: AsyncIterable<Uint8Array>,
  limit: number,
  chunkSize: number,
): AsyncGenerator<Uint8Array> {
  let remaining = limit;
  if (remaining === 0) return;

  for await (const chunk of body) {
    let offset = 0;
    while (offset < chunk.byteLength && remaining > 0) {
      const take = Math.min(chunkSize, remaining, chunk.byteLength - offset);
      yield chunk.subarray(offset, offset + take);
      offset += take;
      remaining -= take;
    }
    if (remaining === 0) return;
  }

  throw new Error(`upstream body ended ${remaining} bytes short of ${limit}`);
}

/**
 * Returns a function that maps bytes-so-far to a percentage the first time
 * each `step`-percent boundary is crossed, and null otherwise.
 */
export function createProgressTracker(total: number, step = 5): (done: number) => number | null {
  let lastBucket = -1;
  return (done) => {
    const percent = total === 0 ? 100 : Math.floor((done / total) * 100);
    const bucket = Math.floor(percent / step);
    if (bucket <= lastBucket) return null;
    lastBucket = bucket;
    return percent;
  };
}

// ─── Factory ────────────────────────────────────────────────────

export function createTransferEngine(deps: {
  artifacts: ArtifactStore;
  ledger: SymbolLedger;
  locks: KeyedLock;
  options: TransferOptions;
}): TransferEngine {
  const { artifacts, ledger, locks, options } = deps;

  async function releaseEntry(entry: SymbolEntry): Promise<void> {
    entry.inFlight = false;
    await ledger.updateEntry(entry);
  }

  return {
    async stream(entry, response) {
      const key = toSymbolKey(entry);
      const label = describeKey(key);
      const paths = artifacts.paths(key);

      await locks.withLock(paths.dir, async () => {
        const size = declaredSize(response.headers);
        if (size === null) {
          log.transfer.error({ key: label }, "upstream sent no content length");
          response.body.destroy();
          await releaseEntry(entry);
          await artifacts.removeTemp(key);
          throw new TransferError(`No size header for ${label}`, key);
        }

        const compress = !isGzipEncoded(response.headers);
        log.transfer.info({ key: label, size, compress }, "download started");

        try {
          await artifacts.writeAtomically(key, { compress }, async (sink) => {
            const progress = createProgressTracker(size);
            let unflushed = 0;
            for await (const slice of readBounded(response.body, size, options.chunkSize)) {
              await sink.write(slice);
              unflushed += slice.byteLength;
              if (unflushed > options.maxMemoryBytes) {
                await sink.flush();
                unflushed = 0;
              }
              const percent = progress(sink.bytesWritten);
              if (percent !== null) {
                log.transfer.debug({ key: label, percent }, "downloading");
              }
            }
          });
        } catch (err) {
          response.body.destroy();
          await releaseEntry(entry);
          const message = err instanceof Error ? err.message : String(err);
          log.transfer.error({ key: label, err: message }, "download failed");
          throw new TransferError(`Download of ${label} failed: ${message}`, key, { cause: err });
        }

        log.transfer.info({ key: label, size }, "download complete");
      });
    },
  };
}
