/**
 * Identifier Types
 *
 * Every identifier crossing the engine boundary is a lowercase,
 * `0x`-prefixed hex string:
 * - 256-bit ids (records, groups, commitments, secrets): 64 hex digits
 * - Participant addresses (domains, callers, recipients): 40 hex digits
 * - Payloads: any even number of hex digits
 *
 * The all-zero value of each width is a sentinel meaning "none".
 */

/** A 256-bit identifier, e.g. a transaction id or commitment hash. */
export type Hex32 = string;

/** A participant identifier: a rollup/domain, a caller, a grantee. */
export type Address = string;

/** An opaque byte blob, hex encoded. */
export type HexBytes = string;

export const ZERO_ID: Hex32 = `0x${"0".repeat(64)}`;

export const ZERO_ADDRESS: Address = `0x${"0".repeat(40)}`;

export const EMPTY_BYTES: HexBytes = "0x";
