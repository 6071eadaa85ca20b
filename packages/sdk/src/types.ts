/**
 * @pegledger/sdk — SDK types.
 *
 * Types specific to the SDK client layer. Response shapes mirror the
 * node's JSON; every integer travels as a base-10 string.
 */

// =============================================================================
// Client Configuration
// =============================================================================

export interface PegLedgerClientConfig {
  /** Base URL of the node (e.g., "http://localhost:8545") */
  readonly baseUrl: string;
  /** Request timeout in milliseconds (default: 30000) */
  readonly timeout?: number | undefined;
  /** Maximum retry attempts for reads that fail with 5xx or a network error (default: 3) */
  readonly retries?: number | undefined;
  /** Base delay of the exponential backoff in milliseconds (default: 1000) */
  readonly retryDelayMs?: number | undefined;
  /** Custom fetch function (for testing or polyfills) */
  readonly fetchFn?: typeof fetch | undefined;
}

// =============================================================================
// Response Types
// =============================================================================

export interface PegLedgerResponse<T> {
  readonly data: T;
  readonly status: number;
  /** Selected response headers */
  readonly headers: Readonly<Record<string, string>>;
}

export interface PaginatedList<T> {
  readonly data: readonly T[];
  readonly pagination: {
    readonly cursor: string | null;
    readonly hasMore: boolean;
  };
}

// =============================================================================
// Error Types
// =============================================================================

/**
 * Structured error from the node, or a transport failure.
 *
 * Transport failures carry status 0 and one of the codes
 * NETWORK_ERROR or TIMEOUT.
 */
export class PegLedgerApiError extends Error {
  /** Error code from the node (e.g., "INSUFFICIENT_BALANCE", "VALIDATION_ERROR") */
  readonly code: string;
  readonly statusCode: number;
  readonly details?: unknown;

  constructor(code: string, message: string, statusCode: number, details?: unknown) {
    super(message);
    this.name = "PegLedgerApiError";
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;
  }
}
