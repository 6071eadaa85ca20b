/**
 * Global error handler middleware.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response.
 *
 * Maps ledger error codes to HTTP status codes:
 * 400 bad input, 401 signature problems, 409 conflicts,
 * 422 business rule violations, 502 a failed outbound transfer,
 * 503 once the service has stopped.
 */

import type { Context } from "hono";
import { LedgerError } from "@pegledger/ledger";
import { ServiceStoppedError } from "../services/ledger-service.js";
import { createErrorEnvelope } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

export type ErrorStatus = 400 | 401 | 404 | 409 | 422 | 500 | 502 | 503;

export const STATUS_MAP: Readonly<Record<string, ErrorStatus>> = {
  // Input
  INVALID_AMOUNT: 400,
  INVALID_ADDRESS: 400,
  ZERO_AMOUNT: 400,
  INVALID_RECIPIENT: 400,
  INVALID_SENDER: 400,
  INVALID_APPROVER: 400,
  INVALID_SPENDER: 400,
  FUTURE_LOOKUP: 400,
  INVALID_SNAPSHOT: 400,
  VALIDATION_ERROR: 400,

  // Signed messages
  INVALID_SIGNATURE: 401,
  INVALID_SIGNER: 401,
  EXPIRED_DEADLINE: 401,

  NOT_FOUND: 404,

  // Conflicts
  REENTRANT_CALL: 409,
  UNORDERED_CHECKPOINT: 409,

  // Business rules
  INSUFFICIENT_BALANCE: 422,
  INSUFFICIENT_ALLOWANCE: 422,
  EXCEEDED_SAFE_SUPPLY: 422,
  ARITHMETIC_OVERFLOW: 422,

  // Outbound native transfer
  TRANSFER_FAILED: 502,

  SERVICE_UNAVAILABLE: 503,
};

export function statusFor(code: string): ErrorStatus {
  return STATUS_MAP[code] ?? 500;
}

// =============================================================================
// Middleware
// =============================================================================

/**
 * Global error handler. Registered as Hono's onError handler.
 */
export function handleError(err: Error, c: Context): Response {
  if (err instanceof LedgerError) {
    const details = err.details === undefined ? undefined : { ...err.details };
    return c.json(createErrorEnvelope(err.code, err.message, details), statusFor(err.code));
  }

  if (err instanceof ServiceStoppedError) {
    return c.json(createErrorEnvelope(err.code, err.message), statusFor(err.code));
  }

  // Don't leak internal details
  return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
}
