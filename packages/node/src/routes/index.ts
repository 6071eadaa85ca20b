/**
 * Route barrel — re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createTokenRoutes } from "./token.js";
export { createAccountRoutes } from "./accounts.js";
export { createLedgerRoutes } from "./ledger.js";
export { createEventRoutes } from "./events.js";
