/**
 * Commit-Reveal Verifier.
 *
 * A committed record is created with only sha256(payload ‖ secret).
 * The payload is disclosed later, once, inside the reveal window
 * (creationHeight, revealDeadline]. An unrevealed record cannot
 * resolve and eventually expires, becoming refundable.
 */

import type { Hex32, TransactionRecord } from "@meridian/types";
import type { ConfigSource } from "./config.js";
import type { OperationContext } from "./context.js";
import {
  byteLength,
  computeCommitment,
  parseHex32,
  parseHexBytes,
} from "./encoding.js";
import { CoordinationError } from "./errors.js";
import type { TransactionLedger } from "./ledger.js";

export class CommitRevealVerifier {
  private readonly ledger: TransactionLedger;
  private readonly config: ConfigSource;

  constructor(ledger: TransactionLedger, config: ConfigSource) {
    this.ledger = ledger;
    this.config = config;
  }

  reveal(
    ctx: OperationContext,
    id: Hex32,
    rawPayload: string,
    rawSecret: string,
  ): TransactionRecord {
    const record = this.ledger.require(id);

    if (record.state.tag !== "BUFFERED") {
      throw new CoordinationError(
        "STATE_ERROR",
        `Transaction '${id}' is ${record.state.tag}; only BUFFERED records can be revealed`,
        { id, state: record.state.tag },
      );
    }
    if (record.revealed) {
      throw new CoordinationError("STATE_ERROR", `Transaction '${id}' is already revealed`, {
        id,
      });
    }
    if (record.commitmentHash === undefined || record.revealDeadline === undefined) {
      throw new CoordinationError(
        "STATE_ERROR",
        `Transaction '${id}' was not created with a commitment`,
        { id },
      );
    }

    if (ctx.height <= record.creationHeight || ctx.height > record.revealDeadline) {
      throw new CoordinationError(
        "TIMING_ERROR",
        `Reveal window for '${id}' is heights (${record.creationHeight}, ${record.revealDeadline}], current ${ctx.height}`,
        {
          id,
          height: ctx.height,
          opensAfter: record.creationHeight,
          closesAt: record.revealDeadline,
        },
      );
    }

    const payload = parseHexBytes(rawPayload, "payload");
    const size = byteLength(payload);
    const max = this.config().maxPayloadSize;
    if (size === 0 || size > max) {
      throw new CoordinationError(
        "VALIDATION_ERROR",
        `payload must be between 1 and ${max} bytes, got ${size}`,
        { field: "payload", size, max },
      );
    }

    const secret = parseHex32(rawSecret, "secret");
    if (computeCommitment(payload, secret) !== record.commitmentHash) {
      throw new CoordinationError(
        "VALIDATION_ERROR",
        `Payload and secret do not match the commitment for '${id}'`,
        { id },
      );
    }

    const revealed: TransactionRecord = { ...record, payload, revealed: true };
    this.ledger.update(revealed);
    ctx.emit({ type: "Revealed", payload: { id } });
    return revealed;
  }

  /** Whether `payload` and `secret` open `commitmentHash`. */
  verify(commitmentHash: Hex32, payload: string, secret: string): boolean {
    return (
      computeCommitment(parseHexBytes(payload, "payload"), parseHex32(secret, "secret")) ===
      commitmentHash.toLowerCase()
    );
  }
}
