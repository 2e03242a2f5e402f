/**
 * artifact-store.ts — On-disk, always-gzip symbol artifacts.
 *
 * Layout (relative to the configured root):
 *   {name}/{identifier}/{filename}.gzip       published artifact
 *   {name}/{identifier}/tmp_{filename}.gzip   download in progress
 *
 * A file at the published path is always complete: writers fill the temp
 * file and rename it into place only after the producer finished.
 */

import * as fs from "node:fs";
import * as fsp from "node:fs/promises";
import { once } from "node:events";
import type { Readable, Writable } from "node:stream";
import { finished, pipeline } from "node:stream/promises";
import { createGzip, type Gzip } from "node:zlib";
import { log } from "../../logger.js";
import { artifactPaths, type ArtifactPaths, type SymbolKey } from "./symbol-key.js";

// ─── Types ──────────────────────────────────────────────────────

/** Write side handed to a producer by `writeAtomically`. */
export interface ArtifactSink {
  /** Resolves once the chunk is accepted (waits out backpressure). */
  write(chunk: Uint8Array): Promise<void>;
  /** Push buffered bytes (including pending gzip output) toward the file. */
  flush(): Promise<void>;
  /** Bytes accepted so far, before compression. */
  readonly bytesWritten: number;
}

export interface WriteOptions {
  /** Gzip on the way to disk. False when the bytes are already gzip. */
  compress: boolean;
}

export interface ArtifactStore {
  readonly root: string;
  paths(key: SymbolKey): ArtifactPaths;
  /** True when a published artifact exists for `key`. */
  exists(key: SymbolKey): Promise<boolean>;
  openCompressed(key: SymbolKey): Readable;
  writeAtomically(
    key: SymbolKey,
    options: WriteOptions,
    producer: (sink: ArtifactSink) => Promise<void>,
  ): Promise<void>;
  /** Delete a leftover temp file. Returns false when there was none. */
  removeTemp(key: SymbolKey): Promise<boolean>;
}

// ─── Helpers ────────────────────────────────────────────────────

function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

export async function isFile(filePath: string): Promise<boolean> {
  try {
    return (await fsp.stat(filePath)).isFile();
  } catch (err) {
    if (errnoCode(err) === "ENOENT" || errnoCode(err) === "ENOTDIR") return false;
    throw err;
  }
}

async function unlinkIfPresent(filePath: string): Promise<boolean> {
  try {
    await fsp.unlink(filePath);
    return true;
  } catch (err) {
    if (errnoCode(err) === "ENOENT") return false;
    throw err;
  }
}

// ─── Temp file sink ─────────────────────────────────────────────

class TempFileSink implements ArtifactSink {
  private written = 0;
  private failure: Error | null = null;
  private readonly file: fs.WriteStream;
  private readonly gzip: Gzip | null;
  /** Settles when the file stream is done; never rejects, failures land in `failure`. */
  private readonly done: Promise<void>;

  constructor(tempPath: string, compress: boolean) {
    this.file = fs.createWriteStream(tempPath, { flags: "w", mode: 0o644 });
    this.gzip = compress ? createGzip() : null;
    const settled = this.gzip ? pipeline(this.gzip, this.file) : finished(this.file);
    this.done = settled.then(
      () => undefined,
      (err: unknown) => {
        this.failure ??= err instanceof Error ? err : new Error(String(err));
      },
    );
  }

  get bytesWritten(): number {
    return this.written;
  }

  private get head(): Writable {
    return this.gzip ?? this.file;
  }

  private throwIfFailed(): void {
    if (this.failure) throw this.failure;
  }

  /** Wait for `event` on `stream`, or for the pipeline to settle, whichever first. */
  private async waitFor(stream: Writable, event: string): Promise<void> {
    const ac = new AbortController();
    try {
      await Promise.race([once(stream, event, { signal: ac.signal }), this.done]);
    } finally {
      ac.abort();
    }
    this.throwIfFailed();
  }

  async write(chunk: Uint8Array): Promise<void> {
    this.throwIfFailed();
    const accepted = this.head.write(chunk);
    this.written += chunk.byteLength;
    if (!accepted) {
      await this.waitFor(this.head, "drain");
    }
  }

  async flush(): Promise<void> {
    this.throwIfFailed();
    const gzip = this.gzip;
    if (gzip) {
      await Promise.race([new Promise<void>((resolve) => gzip.flush(() => resolve())), this.done]);
      this.throwIfFailed();
    }
    if (this.file.writableNeedDrain) {
      await this.waitFor(this.file, "drain");
    }
  }

  async close(): Promise<void> {
    this.throwIfFailed();
    this.head.end();
    await this.done;
    this.throwIfFailed();
  }

  async abort(): Promise<void> {
    this.gzip?.destroy();
    this.file.destroy();
    await this.done;
  }
}

// ─── Factory ────────────────────────────────────────────────────

export function createArtifactStore(root: string): ArtifactStore {
  const store: ArtifactStore = {
    root,

    paths(key) {
      return artifactPaths(root, key);
    },

    async exists(key) {
      return isFile(store.paths(key).artifact);
    },

    openCompressed(key) {
      return fs.createReadStream(store.paths(key).artifact);
    },

    async writeAtomically(key, options, producer) {
      const paths = store.paths(key);
      await fsp.mkdir(paths.dir, { recursive: true, mode: 0o755 });

      const sink = new TempFileSink(paths.temp, options.compress);
      try {
        await producer(sink);
        await sink.close();
        await fsp.rename(paths.temp, paths.artifact);
      } catch (err) {
        await sink.abort();
        try {
          await unlinkIfPresent(paths.temp);
        } catch (cleanupErr) {
          log.store.warn(
            { temp: paths.temp, err: cleanupErr instanceof Error ? cleanupErr.message : String(cleanupErr) },
            "could not remove temp file",
          );
        }
        throw err;
      }
    },

    async removeTemp(key) {
      return unlinkIfPresent(store.paths(key).temp);
    },
  };

  return store;
}
