/**
 * @pegledger/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";

// =============================================================================
// Schema
// =============================================================================

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(8545),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Signing domain
  CHAIN_ID: z.coerce.number().int().min(1).default(31337),
  LEDGER_ADDRESS: z
    .string()
    .regex(/^0x[0-9a-fA-F]{40}$/, "LEDGER_ADDRESS must be a 20-byte hex address")
    .default("0x5FbDB2315678afecb367f032d93F642f64180aa3"),
  EIP712_VERSION: z.string().min(1).default("1"),

  // Token metadata
  TOKEN_NAME: z.string().min(1).default("Wrapped Ether"),
  TOKEN_SYMBOL: z.string().min(1).default("WETH"),
  TOKEN_DECIMALS: z.coerce.number().int().min(0).max(36).default(18),

  // Native balances seeded at start-up
  GENESIS_ALLOCATIONS: z.string().default(""),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Genesis Allocation Parsing
// =============================================================================

export interface GenesisAllocation {
  readonly address: string;
  readonly amount: bigint;
}

const ADDRESS_PATTERN = /^0x[0-9a-fA-F]{40}$/;
const AMOUNT_PATTERN = /^\d+$/;

/**
 * Parse the GENESIS_ALLOCATIONS env var into native-asset balances.
 *
 * Format: "0xaddr1:amount1,0xaddr2:amount2" (amounts in base units)
 */
export function parseGenesisAllocations(raw: string): readonly GenesisAllocation[] {
  if (raw.trim() === "") {
    return [];
  }

  const allocations: GenesisAllocation[] = [];

  for (const entry of raw.split(",")) {
    const parts = entry.trim().split(":");
    const [address, amount] = parts;
    if (parts.length !== 2 || address === undefined || amount === undefined) {
      throw new Error(
        `Invalid GENESIS_ALLOCATIONS entry: "${entry.trim()}". Expected format: address:amount`,
      );
    }

    if (!ADDRESS_PATTERN.test(address)) {
      throw new Error(`Invalid address "${address}" in GENESIS_ALLOCATIONS`);
    }
    if (!AMOUNT_PATTERN.test(amount)) {
      throw new Error(
        `Invalid amount "${amount}" in GENESIS_ALLOCATIONS. Must be a base-10 integer`,
      );
    }

    allocations.push({ address, amount: BigInt(amount) });
  }

  return allocations;
}

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if required env vars are missing or invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}
