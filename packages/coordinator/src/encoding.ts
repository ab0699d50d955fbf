/**
 * Boundary parsing for identifiers and payloads.
 *
 * Every raw string entering the engine passes through one of these
 * functions, which lowercases it and rejects malformed or zero values
 * with VALIDATION_ERROR naming the offending field.
 */

import { createHash } from "node:crypto";
import type { Address, Hex32, HexBytes } from "@meridian/types";
import {
  isAddress,
  isHex32,
  isHexBytes,
  ZERO_ADDRESS,
  ZERO_ID,
} from "@meridian/types";
import { CoordinationError } from "./errors.js";

// =============================================================================
// 256-bit identifiers
// =============================================================================

export function parseHex32(value: string, field: string): Hex32 {
  if (!isHex32(value)) {
    throw new CoordinationError(
      "VALIDATION_ERROR",
      `${field} must be 0x followed by 64 hex digits`,
      { field },
    );
  }
  return value.toLowerCase();
}

export function parseNonZeroHex32(value: string, field: string): Hex32 {
  const parsed = parseHex32(value, field);
  if (parsed === ZERO_ID) {
    throw new CoordinationError("VALIDATION_ERROR", `${field} must be non-zero`, {
      field,
    });
  }
  return parsed;
}

/**
 * Parse an optional reference. Absent and zero both mean "none".
 */
export function parseOptionalHex32(
  value: string | undefined,
  field: string,
): Hex32 | undefined {
  if (value === undefined) return undefined;
  const parsed = parseHex32(value, field);
  return parsed === ZERO_ID ? undefined : parsed;
}

// =============================================================================
// Addresses
// =============================================================================

export function parseAddress(value: string, field: string): Address {
  if (!isAddress(value)) {
    throw new CoordinationError(
      "VALIDATION_ERROR",
      `${field} must be 0x followed by 40 hex digits`,
      { field },
    );
  }
  const parsed = value.toLowerCase();
  if (parsed === ZERO_ADDRESS) {
    throw new CoordinationError("VALIDATION_ERROR", `${field} must be non-zero`, {
      field,
    });
  }
  return parsed;
}

// =============================================================================
// Payloads
// =============================================================================

export function parseHexBytes(value: string, field: string): HexBytes {
  if (!isHexBytes(value)) {
    throw new CoordinationError(
      "VALIDATION_ERROR",
      `${field} must be 0x followed by an even number of hex digits`,
      { field },
    );
  }
  return value.toLowerCase();
}

export function byteLength(bytes: HexBytes): number {
  return (bytes.length - 2) / 2;
}

/**
 * sha256(payload ‖ secret), as a 256-bit identifier.
 */
export function computeCommitment(payload: HexBytes, secret: Hex32): Hex32 {
  const digest = createHash("sha256")
    .update(Buffer.from(payload.slice(2), "hex"))
    .update(Buffer.from(secret.slice(2), "hex"))
    .digest("hex");
  return `0x${digest}`;
}
