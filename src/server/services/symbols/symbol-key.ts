/**
 * symbol-key.ts — Symbol key validation and path derivation.
 *
 * A key is (name, identifier, filename), e.g.
 *   ("chrome.dll.pdb", "ABCD1234", "chrome.dll.pdb")
 *
 * Every component ends up as a directory or file name under the artifact
 * root, so nothing here builds a path before the key has been validated.
 */

import * as path from "node:path";

export interface SymbolKey {
  readonly name: string;
  readonly identifier: string;
  readonly filename: string;
}

export type SymbolKeyField = keyof SymbolKey;

export const MAX_COMPONENT_LENGTH = 255;
export const ARTIFACT_SUFFIX = ".gzip";
export const TEMP_PREFIX = "tmp_";

const SAFE_COMPONENT = /^[a-zA-Z0-9._-]+$/;

/** A key field failed validation. Surfaced to clients as 400, never retried. */
export class SymbolKeyError extends Error {
  constructor(
    readonly field: SymbolKeyField,
    message: string,
  ) {
    super(message);
    this.name = "SymbolKeyError";
  }
}

export function validatePathComponent(field: SymbolKeyField, value: string): string {
  if (!value || value.length > MAX_COMPONENT_LENGTH) {
    throw new SymbolKeyError(field, `Invalid ${field}: must be non-empty and <= ${MAX_COMPONENT_LENGTH} characters`);
  }
  if (value === "." || value.includes("..") || value.includes("/") || value.includes("\\")) {
    throw new SymbolKeyError(field, `Invalid ${field}: path traversal or separator characters not allowed`);
  }
  if (!SAFE_COMPONENT.test(value)) {
    throw new SymbolKeyError(field, `Invalid ${field}: only letters, digits, '.', '_' and '-' are allowed`);
  }
  return value;
}

export function validateSymbolKey(key: SymbolKey): SymbolKey {
  validatePathComponent("name", key.name);
  validatePathComponent("identifier", key.identifier);
  validatePathComponent("filename", key.filename);
  return key;
}

/** Copy just the key fields (drops ledger columns when given an entry). */
export function toSymbolKey(key: SymbolKey): SymbolKey {
  return Object.freeze({ name: key.name, identifier: key.identifier, filename: key.filename });
}

export function describeKey(key: SymbolKey): string {
  return `${key.name}/${key.identifier}/${key.filename}`;
}

// ─── Paths ──────────────────────────────────────────────────────

export interface ArtifactPaths {
  /** `{root}/{name}/{identifier}`; also the per-key lock key */
  dir: string;
  /** Published artifact */
  artifact: string;
  /** In-progress download */
  temp: string;
}

export function artifactPaths(root: string, key: SymbolKey): ArtifactPaths {
  validateSymbolKey(key);
  const dir = path.join(root, key.name, key.identifier);
  return {
    dir,
    artifact: path.join(dir, `${key.filename}${ARTIFACT_SUFFIX}`),
    temp: path.join(dir, `${TEMP_PREFIX}${key.filename}${ARTIFACT_SUFFIX}`),
  };
}

/** `{base}/{name}/{identifier}/{filename}` with each component escaped. */
export function upstreamUrl(base: string, key: SymbolKey): string {
  validateSymbolKey(key);
  const trimmed = base.replace(/\/+$/, "");
  return [trimmed, key.name, key.identifier, key.filename]
    .map((part, i) => (i === 0 ? part : encodeURIComponent(part)))
    .join("/");
}
