/**
 * symbol-cache.ts — Cache coordinator: hit, miss, schedule, reconcile.
 *
 * resolve():
 *   artifact on disk  → hit (raw gzip path, or a decompressing stream);
 *                       the ledger row is re-created if it went missing
 *   no artifact       → find/create the row, claim it (in_flight false → true)
 *                       and schedule one background fetch; a row that is
 *                       already in flight, or a lost claim, schedules nothing
 *
 * reconcile() runs once at boot, before the server listens: every row left
 * in flight by a previous process loses its temp file and its in-flight flag.
 */

import type { Readable } from "node:stream";
import { log } from "../../logger.js";
import type { ArtifactStore } from "./artifact-store.js";
import type { BackgroundTasks } from "./background-tasks.js";
import { openDecompressedStream } from "./decompress.js";
import type { SymbolEntry, SymbolLedger } from "./ledger.js";
import type { SourceOrchestrator } from "./source-orchestrator.js";
import { describeKey, SymbolKeyError, toSymbolKey, validateSymbolKey, type SymbolKey } from "./symbol-key.js";

// ─── Types ──────────────────────────────────────────────────────

export type ResolveResult =
  | { kind: "hit"; encoding: "gzip"; path: string }
  | { kind: "hit"; encoding: "identity"; stream: Readable }
  | { kind: "miss"; scheduled: boolean };

export interface ReconcileSummary {
  /** Rows moved out of the in-flight state */
  reset: number;
  /** Temp files deleted from disk */
  tempFilesRemoved: number;
}

export interface SymbolCache {
  /** Throws SymbolKeyError for malformed keys. */
  resolve(key: SymbolKey, acceptsCompressed: boolean): Promise<ResolveResult>;
  reconcile(): Promise<ReconcileSummary>;
  /** Wait for every scheduled fetch to settle. */
  drain(): Promise<void>;
}

export interface SymbolCacheDeps {
  ledger: SymbolLedger;
  artifacts: ArtifactStore;
  orchestrator: SourceOrchestrator;
  tasks: BackgroundTasks;
  chunkSize: number;
  maxMemoryBytes: number;
}

// ─── Factory ────────────────────────────────────────────────────

export function createSymbolCache(deps: SymbolCacheDeps): SymbolCache {
  const { ledger, artifacts, orchestrator, tasks } = deps;

  /** Read-repair: the artifact exists, so the ledger should say so. */
  async function recordFound(key: SymbolKey): Promise<void> {
    const entry = await ledger.findEntry(key.identifier, key.filename);
    if (!entry) {
      await ledger.createEntry(key, true);
      log.cache.info({ key: describeKey(key) }, "ledger row re-created for cached artifact");
      return;
    }
    if (!entry.found && !entry.inFlight) {
      entry.found = true;
      await ledger.updateEntry(entry);
    }
  }

  return {
    async resolve(input, acceptsCompressed) {
      const key = toSymbolKey(validateSymbolKey(input));
      const label = describeKey(key);

      if (await artifacts.exists(key)) {
        await recordFound(key);
        const { artifact } = artifacts.paths(key);
        if (acceptsCompressed) {
          log.cache.debug({ key: label }, "hit, serving gzip");
          return { kind: "hit", encoding: "gzip", path: artifact };
        }
        log.cache.debug({ key: label }, "hit, serving decompressed");
        return {
          kind: "hit",
          encoding: "identity",
          stream: openDecompressedStream(artifact, { chunkSize: deps.chunkSize, maxBytes: deps.maxMemoryBytes }),
        };
      }

      const row =
        (await ledger.findEntry(key.identifier, key.filename)) ?? (await ledger.createEntry(key));

      if (row.inFlight) {
        log.cache.debug({ key: label }, "still downloading");
        return { kind: "miss", scheduled: false };
      }

      // The claim records the requested name; the row may have been created for another one.
      const entry: SymbolEntry = { ...row, name: key.name };
      if (!(await ledger.claimEntry(entry))) {
        log.cache.debug({ key: label }, "another request claimed the download");
        return { kind: "miss", scheduled: false };
      }

      tasks.run(`acquire ${label}`, () => orchestrator.acquire(entry));
      log.cache.info({ key: label }, "miss, download scheduled");
      return { kind: "miss", scheduled: true };
    },

    async reconcile() {
      const stale = await ledger.listInFlightEntries();
      let tempFilesRemoved = 0;

      for (const entry of stale) {
        try {
          if (await artifacts.removeTemp(entry)) {
            tempFilesRemoved++;
          }
        } catch (err) {
          if (err instanceof SymbolKeyError) {
            log.cache.warn({ id: entry.id, err: err.message }, "invalid path components in stale entry");
          } else {
            log.cache.error(
              { key: describeKey(entry), err: err instanceof Error ? err.message : String(err) },
              "could not remove temp file of interrupted download",
            );
          }
        }
        entry.inFlight = false;
        await ledger.updateEntry(entry);
      }

      log.cache.info({ reset: stale.length, tempFilesRemoved }, "stale downloads reconciled");
      return { reset: stale.length, tempFilesRemoved };
    },

    drain() {
      return tasks.drain();
    },
  };
}
