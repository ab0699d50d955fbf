/**
 * @meridian/store — Hash chain for tamper-evident logs.
 *
 * Each entry is hashed using RFC 8785 (JCS) canonicalization + SHA-256,
 * including the previous entry's hash:
 *
 *   entry[1].hash = sha256(canonicalize(content[1]) + "genesis")
 *   entry[n].hash = sha256(canonicalize(content[n]) + entry[n-1].hash)
 *
 * Any modification to any entry breaks the chain from that point forward.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type { ChainLink, IntegrityError, IntegrityResult } from "./types.js";

/**
 * The hash used as `previousHash` for the first entry in a chain.
 */
export const GENESIS_HASH = "genesis";

/**
 * Compute the SHA-256 hash of an entry's content given its predecessor's hash.
 *
 * @returns Hex-encoded SHA-256 hash
 */
export function computeEntryHash(
  content: unknown,
  previousHash: string,
): string {
  return createHash("sha256")
    .update(canonicalize(content) + previousHash)
    .digest("hex");
}

/**
 * Verify a sequence of chained entries in position order.
 *
 * @param entries - Entries in position order
 * @param contentOf - Extracts the hashed content (everything except the link fields)
 */
export function verifyHashChain<T extends ChainLink>(
  entries: readonly T[],
  contentOf: (entry: T) => unknown,
): IntegrityResult {
  const errors: IntegrityError[] = [];
  let previousHash = GENESIS_HASH;
  let expectedPosition = 1;
  let lastVerifiedPosition = 0;

  for (const entry of entries) {
    if (entry.position !== expectedPosition) {
      errors.push({
        position: entry.position,
        reason: `Position gap: expected ${expectedPosition}, got ${entry.position}`,
      });
    }

    if (entry.previousHash !== previousHash) {
      errors.push({
        position: entry.position,
        reason: `previousHash mismatch at position ${entry.position}: expected "${previousHash}", got "${entry.previousHash}"`,
      });
    }

    const expectedHash = computeEntryHash(contentOf(entry), entry.previousHash);
    if (entry.hash !== expectedHash) {
      errors.push({
        position: entry.position,
        reason: `Hash mismatch at position ${entry.position}: expected "${expectedHash}", got "${entry.hash}"`,
      });
    }

    if (errors.length === 0) {
      lastVerifiedPosition = entry.position;
    }

    previousHash = entry.hash;
    expectedPosition = entry.position + 1;
  }

  return {
    valid: errors.length === 0,
    lastVerifiedPosition,
    errors,
  };
}

/** Hashed content of a record-ledger entry. */
export function ledgerEntryContent(entry: {
  readonly kind: string;
  readonly position: number;
  readonly value: unknown;
}): unknown {
  return { kind: entry.kind, position: entry.position, value: entry.value };
}

/** Hashed content of a journal entry. */
export function signalEntryContent(entry: {
  readonly position: number;
  readonly signal: unknown;
}): unknown {
  return { position: entry.position, signal: entry.signal };
}
