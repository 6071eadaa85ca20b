/**
 * @pegledger/node — HTTP host for a pegged-token ledger.
 *
 * Package public API; main.ts is the executable entry point.
 */

export { LedgerService, ServiceStoppedError, serializeEvent } from "./services/ledger-service.js";
export type {
  LedgerServiceConfig,
  SerializedEvent,
  Receipt,
  TokenView,
  AccountView,
  CheckpointView,
  HealthReport,
} from "./services/ledger-service.js";
export { SerialQueue } from "./services/serial-queue.js";
export { loadConfig, parseGenesisAllocations, ConfigSchema } from "./config.js";
export type { AppConfig, GenesisAllocation } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./middleware/index.js";
export * from "./routes/index.js";
export * from "./types/index.js";
