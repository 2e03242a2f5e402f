/**
 * decompress.ts — Gunzip an artifact for clients without gzip support.
 *
 * The stream is lazy and single-use. It stops early, with a warning, once
 * more than `maxBytes` have been emitted.
 */

import * as fs from "node:fs";
import { pipeline, Readable } from "node:stream";
import { constants as zlibConstants, createGunzip } from "node:zlib";
import { log } from "../../logger.js";

export interface DecompressOptions {
  chunkSize: number;
  maxBytes: number;
}

export async function* decompressedChunks(file: string, options: DecompressOptions): AsyncGenerator<Buffer> {
  const chunkSize = Math.max(options.chunkSize, zlibConstants.Z_MIN_CHUNK);
  const gunzip = pipeline(
    fs.createReadStream(file, { highWaterMark: chunkSize }),
    createGunzip({ chunkSize }),
    (err) => {
      // Errors also surface through iteration below; this only records early stops.
      if (err) log.cache.debug({ file, err: err.message }, "decompression pipeline closed");
    },
  );

  let emitted = 0;
  for await (const chunk of gunzip) {
    if (!Buffer.isBuffer(chunk)) continue;
    if (emitted > options.maxBytes) {
      log.cache.warn({ file, emitted, maxBytes: options.maxBytes }, "decompression limit reached, truncating response");
      break;
    }
    emitted += chunk.length;
    yield chunk;
  }
}

export function openDecompressedStream(file: string, options: DecompressOptions): Readable {
  return Readable.from(decompressedChunks(file, options), { objectMode: false });
}
