/**
 * Type barrel — re-exports all public types from @pegledger/node.
 */

// DTOs
export {
  AddressSchema,
  UintSchema,
  SignatureSchema,
  PaginationQuerySchema,
  DepositSchema,
  WithdrawSchema,
  TransferSchema,
  ApproveSchema,
  TransferFromSchema,
  PermitSchema,
  DelegateSchema,
  DelegateBySigSchema,
  VotesQuerySchema,
  ListEventsQuerySchema,
} from "./dto.js";
export type {
  DepositDto,
  WithdrawDto,
  TransferDto,
  ApproveDto,
  TransferFromDto,
  PermitDto,
  DelegateDto,
  DelegateBySigDto,
  VotesQuery,
  ListEventsQuery,
} from "./dto.js";

// Error
export { createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// Pagination
export { encodeCursor, decodeCursor, paginate } from "./pagination.js";
export type {
  PaginationQuery,
  PaginationMeta,
  PaginatedResponse,
} from "./pagination.js";

// App env
export type { AppEnv, ValidatedEnv } from "./api-contract.js";
