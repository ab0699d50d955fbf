/**
 * Type barrel — re-exports all public types from @meridian/node.
 */

// DTOs
export {
  PaginationQuerySchema,
  BufferTransactionSchema,
  BufferCommittedSchema,
  RevealSchema,
  MarkFailedSchema,
  AddToGroupSchema,
  ListTransactionsQuerySchema,
  RoleChangeSchema,
  UpdateConfigSchema,
  TransferOwnershipSchema,
  EmergencyAdminSchema,
  ListSignalsQuerySchema,
} from "./dto.js";
export type {
  BufferTransactionDto,
  BufferCommittedDto,
  RevealDto,
  MarkFailedDto,
  AddToGroupDto,
  ListTransactionsQuery,
  RoleChangeDto,
  UpdateConfigDto,
  TransferOwnershipDto,
  EmergencyAdminDto,
  ListSignalsQuery,
} from "./dto.js";

// Error
export { createErrorEnvelope, envelopeFor } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// Pagination
export { encodeCursor, decodeCursor, paginate } from "./pagination.js";
export type {
  PaginationQuery,
  PaginationMeta,
  PaginatedResponse,
} from "./pagination.js";

// App env
export type { AppEnv } from "./api-contract.js";
