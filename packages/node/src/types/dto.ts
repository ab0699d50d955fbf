/**
 * Request DTOs with Zod validation schemas.
 *
 * Schemas check shape only. Hex encodings, bounds and ordering rules are
 * enforced by the engine, which reports them as VALIDATION_ERROR.
 */

import { z } from "zod";
import type { SignalType, TransactionStateTag } from "@meridian/types";
import { isSignalType, isTransactionStateTag } from "@meridian/types";

// =============================================================================
// Shared Schemas
// =============================================================================

export const PaginationQuerySchema = z.object({
  cursor: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

const hex = z.string().min(2).max(4098);

// =============================================================================
// Transaction DTOs
// =============================================================================

export const BufferTransactionSchema = z.object({
  id: hex,
  originDomain: hex,
  targetDomain: hex,
  payload: hex,
  dependencyId: hex.optional(),
  requestedTime: z.number().int(),
});

export type BufferTransactionDto = z.infer<typeof BufferTransactionSchema>;

export const BufferCommittedSchema = z.object({
  id: hex,
  originDomain: hex,
  targetDomain: hex,
  commitmentHash: hex,
  dependencyId: hex.optional(),
  requestedTime: z.number().int(),
  groupId: hex.optional(),
  refundRecipient: hex.optional(),
});

export type BufferCommittedDto = z.infer<typeof BufferCommittedSchema>;

export const RevealSchema = z.object({
  payload: hex,
  secret: hex,
});

export type RevealDto = z.infer<typeof RevealSchema>;

export const MarkFailedSchema = z.object({
  reason: z.string().max(1024),
});

export type MarkFailedDto = z.infer<typeof MarkFailedSchema>;

export const AddToGroupSchema = z.object({
  groupId: hex,
});

export type AddToGroupDto = z.infer<typeof AddToGroupSchema>;

export const ListTransactionsQuerySchema = PaginationQuerySchema.extend({
  state: z
    .custom<TransactionStateTag>(isTransactionStateTag, "Unknown transaction state")
    .optional(),
  targetDomain: z.string().optional(),
});

export type ListTransactionsQuery = z.infer<typeof ListTransactionsQuerySchema>;

// =============================================================================
// Admin DTOs
// =============================================================================

export const RoleChangeSchema = z.object({
  role: z.enum(["BUFFER", "RESOLVE", "ADMIN"]),
  account: hex,
});

export type RoleChangeDto = z.infer<typeof RoleChangeSchema>;

export const UpdateConfigSchema = z
  .object({
    coordinationWindow: z.number().int().optional(),
    maxPayloadSize: z.number().int().optional(),
    circuitBreakerThreshold: z.number().int().optional(),
  })
  .strict()
  .refine(
    (v) =>
      v.coordinationWindow !== undefined ||
      v.maxPayloadSize !== undefined ||
      v.circuitBreakerThreshold !== undefined,
    { message: "At least one setting is required" },
  );

export type UpdateConfigDto = z.infer<typeof UpdateConfigSchema>;

export const TransferOwnershipSchema = z.object({
  newOwner: hex,
});

export type TransferOwnershipDto = z.infer<typeof TransferOwnershipSchema>;

export const EmergencyAdminSchema = z.object({
  account: hex,
});

export type EmergencyAdminDto = z.infer<typeof EmergencyAdminSchema>;

// =============================================================================
// Signal DTOs
// =============================================================================

export const ListSignalsQuerySchema = PaginationQuerySchema.extend({
  type: z.custom<SignalType>(isSignalType, "Unknown signal type").optional(),
});

export type ListSignalsQuery = z.infer<typeof ListSignalsQuerySchema>;
