/**
 * source-orchestrator.ts — Try each upstream in order until one delivers.
 *
 * Per candidate: retrying GET, then the transfer engine on 200. Non-200,
 * transport errors and transfer failures move on to the next candidate.
 * The `finally` block is the only place a fetch ends: it always clears
 * `inFlight` and records `found`.
 */

import { log } from "../../logger.js";
import type { SymbolEntry, SymbolLedger } from "./ledger.js";
import { describeKey, SymbolKeyError, upstreamUrl, validateSymbolKey } from "./symbol-key.js";
import type { TransferEngine } from "./transfer.js";
import type { UpstreamClient, UpstreamResponse } from "./upstream-client.js";

export interface SourceOrchestrator {
  /** Fetch and publish `entry`. Resolves true when an artifact was published. */
  acquire(entry: SymbolEntry): Promise<boolean>;
}

function errMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function createSourceOrchestrator(deps: {
  ledger: SymbolLedger;
  client: UpstreamClient;
  transfer: TransferEngine;
  upstreams: readonly string[];
}): SourceOrchestrator {
  const { ledger, client, transfer, upstreams } = deps;

  async function tryCandidate(base: string, entry: SymbolEntry): Promise<boolean> {
    const url = upstreamUrl(base, entry);
    log.upstream.debug({ url }, "trying upstream");

    let res: UpstreamResponse;
    try {
      res = await client.get(url);
    } catch (err) {
      log.upstream.warn({ upstream: base, err: errMessage(err) }, "network error");
      return false;
    }

    if (res.status !== 200) {
      res.body.destroy();
      log.upstream.debug({ url, status: res.status }, "symbol not on upstream");
      return false;
    }

    try {
      await transfer.stream(entry, res);
      return true;
    } catch (err) {
      log.upstream.error({ upstream: base, err: errMessage(err) }, "transfer failed, trying next upstream");
      return false;
    }
  }

  return {
    async acquire(entry) {
      const label = describeKey(entry);
      let found = false;
      try {
        try {
          validateSymbolKey(entry);
        } catch (err) {
          if (err instanceof SymbolKeyError) {
            log.upstream.error({ key: label, err: err.message }, "invalid ledger entry, not fetching");
            return false;
          }
          throw err;
        }

        for (const base of upstreams) {
          if (await tryCandidate(base, entry)) {
            found = true;
            break;
          }
        }

        if (!found) {
          log.upstream.error({ key: label, upstreams: upstreams.length }, "symbol not found on any upstream");
        }
        return found;
      } finally {
        entry.found = found;
        entry.inFlight = false;
        await ledger.updateEntry(entry);
      }
    },
  };
}
