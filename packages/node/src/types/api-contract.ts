/**
 * Hono application environment type.
 *
 * Defines the typed context variables available in all route handlers.
 * These are set by middleware and consumed by route handlers.
 */

import type { LedgerService } from "../services/ledger-service.js";

/**
 * Hono environment type for the node app.
 *
 * Middleware populates Variables; route handlers read them via c.get().
 */
export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** The ledger host shared by every request */
    service: LedgerService;
  };
}

/**
 * AppEnv plus a request body that passed validation.
 */
export interface ValidatedEnv<T> {
  Variables: AppEnv["Variables"] & {
    /** Parsed body (set by validateBody) */
    validatedBody: T;
  };
}
