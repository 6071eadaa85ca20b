/**
 * Request/Response DTOs with Zod validation schemas.
 *
 * Each DTO has a Zod schema and a derived TypeScript type.
 * Route handlers use these for body/query validation.
 *
 * Amounts, nonces and deadlines travel as base-10 strings of the integer
 * value and are parsed to bigint here; addresses are checked for shape
 * and normalized by the ledger.
 */

import { z } from "zod";

// =============================================================================
// Shared Schemas
// =============================================================================

export const AddressSchema = z
  .string()
  .regex(/^0x[0-9a-fA-F]{40}$/, "Expected a 0x-prefixed 20-byte hex address");

export const UintSchema = z
  .string()
  .regex(/^(0|[1-9]\d*)$/, "Expected a base-10 integer string")
  .transform((value) => BigInt(value));

export const SignatureSchema = z
  .string()
  .regex(/^0x[0-9a-fA-F]*$/, "Expected a 0x-prefixed hex string");

export const PaginationQuerySchema = z.object({
  cursor: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

// =============================================================================
// Peg DTOs
// =============================================================================

export const DepositSchema = z.object({
  account: AddressSchema,
  amount: UintSchema,
});

export type DepositDto = z.infer<typeof DepositSchema>;

export const WithdrawSchema = z.object({
  account: AddressSchema,
  amount: UintSchema,
});

export type WithdrawDto = z.infer<typeof WithdrawSchema>;

// =============================================================================
// Token DTOs
// =============================================================================

export const TransferSchema = z.object({
  from: AddressSchema,
  to: AddressSchema,
  amount: UintSchema,
});

export type TransferDto = z.infer<typeof TransferSchema>;

export const ApproveSchema = z.object({
  owner: AddressSchema,
  spender: AddressSchema,
  amount: UintSchema,
});

export type ApproveDto = z.infer<typeof ApproveSchema>;

export const TransferFromSchema = z.object({
  spender: AddressSchema,
  from: AddressSchema,
  to: AddressSchema,
  amount: UintSchema,
});

export type TransferFromDto = z.infer<typeof TransferFromSchema>;

export const PermitSchema = z.object({
  owner: AddressSchema,
  spender: AddressSchema,
  value: UintSchema,
  deadline: UintSchema,
  signature: SignatureSchema,
});

export type PermitDto = z.infer<typeof PermitSchema>;

// =============================================================================
// Delegation DTOs
// =============================================================================

export const DelegateSchema = z.object({
  account: AddressSchema,
  delegatee: AddressSchema,
});

export type DelegateDto = z.infer<typeof DelegateSchema>;

export const DelegateBySigSchema = z.object({
  delegatee: AddressSchema,
  nonce: UintSchema,
  expiry: UintSchema,
  signature: SignatureSchema,
});

export type DelegateBySigDto = z.infer<typeof DelegateBySigSchema>;

// =============================================================================
// Query DTOs
// =============================================================================

export const VotesQuerySchema = z.object({
  at: UintSchema.optional(),
});

export type VotesQuery = z.infer<typeof VotesQuerySchema>;

export const ListEventsQuerySchema = PaginationQuerySchema.extend({
  afterPosition: z.coerce.number().int().min(0).optional(),
  type: z.string().min(1).optional(),
});

export type ListEventsQuery = z.infer<typeof ListEventsQuerySchema>;
