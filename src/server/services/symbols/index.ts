/**
 * symbols/index.ts — Symbol cache core (barrel + wiring)
 *
 * Leaf → root:
 *   symbol-key → keyed-lock → artifact-store → upstream-client
 *   → transfer → source-orchestrator → symbol-cache
 */

import type { AppConfig } from "../../config.js";
import { createArtifactStore } from "./artifact-store.js";
import { createBackgroundTasks } from "./background-tasks.js";
import { createKeyedLock } from "./keyed-lock.js";
import type { SymbolLedger } from "./ledger.js";
import { createSourceOrchestrator } from "./source-orchestrator.js";
import { createSymbolCache, type SymbolCache } from "./symbol-cache.js";
import { createTransferEngine } from "./transfer.js";
import { createUpstreamClient, httpGet, type UpstreamTransport } from "./upstream-client.js";

export * from "./symbol-key.js";
export type { SymbolEntry, SymbolLedger } from "./ledger.js";
export { createArtifactStore, type ArtifactStore, type ArtifactSink } from "./artifact-store.js";
export { createKeyedLock, type KeyedLock } from "./keyed-lock.js";
export {
  createUpstreamClient,
  httpGet,
  requestWithRetry,
  UpstreamError,
  RETRYABLE_STATUS,
  type UpstreamClient,
  type UpstreamResponse,
  type UpstreamTransport,
  type RetryPolicy,
} from "./upstream-client.js";
export { createTransferEngine, TransferError, type TransferEngine } from "./transfer.js";
export { createSourceOrchestrator, type SourceOrchestrator } from "./source-orchestrator.js";
export { createBackgroundTasks, type BackgroundTasks } from "./background-tasks.js";
export { openDecompressedStream } from "./decompress.js";
export { createSymbolCache, type SymbolCache, type ResolveResult, type ReconcileSummary } from "./symbol-cache.js";

export type SymbolCacheConfig = Pick<
  AppConfig,
  "symbolPath" | "upstreams" | "chunkSize" | "maxRetries" | "retryBackoffMs" | "maxMemoryBytes" | "upstreamTimeoutMs"
>;

/** Wire the whole core against one ledger. `transport` is swappable for tests. */
export function createSymbolCacheFromConfig(
  config: SymbolCacheConfig,
  ledger: SymbolLedger,
  transport: UpstreamTransport = httpGet,
): SymbolCache {
  const artifacts = createArtifactStore(config.symbolPath);
  const transfer = createTransferEngine({
    artifacts,
    ledger,
    locks: createKeyedLock(),
    options: { chunkSize: config.chunkSize, maxMemoryBytes: config.maxMemoryBytes },
  });
  const client = createUpstreamClient(
    { maxAttempts: config.maxRetries, backoffMs: config.retryBackoffMs, timeoutMs: config.upstreamTimeoutMs },
    transport,
  );
  const orchestrator = createSourceOrchestrator({ ledger, client, transfer, upstreams: config.upstreams });

  return createSymbolCache({
    ledger,
    artifacts,
    orchestrator,
    tasks: createBackgroundTasks(),
    chunkSize: config.chunkSize,
    maxMemoryBytes: config.maxMemoryBytes,
  });
}
