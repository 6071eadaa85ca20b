/**
 * @pegledger/ledger — Checked unsigned arithmetic.
 *
 * All amounts are bigint and must fit a uint256.
 * Decimal strings are converted to/from bigint via decimal scaling.
 *
 * Rules:
 * - No floating-point operations
 * - No silent wrap-around: overflow and underflow throw
 * - Amounts are never negative
 */

import { LedgerError } from "./types.js";

export const MAX_UINT256 = 2n ** 256n - 1n;

/** Largest total supply the vote checkpoints can hold (uint208). */
export const MAX_SAFE_SUPPLY = 2n ** 208n - 1n;

/** Allowance that is never decremented. */
export const UNLIMITED_ALLOWANCE = MAX_UINT256;

/**
 * Assert a value is a uint256. Returns it unchanged.
 */
export function assertUint(value: bigint, label = "amount"): bigint {
  if (value < 0n || value > MAX_UINT256) {
    throw new LedgerError("INVALID_AMOUNT", `${label} is not a uint256: ${value.toString()}`);
  }
  return value;
}

export function checkedAdd(a: bigint, b: bigint): bigint {
  const sum = a + b;
  if (sum > MAX_UINT256) {
    throw new LedgerError(
      "ARITHMETIC_OVERFLOW",
      `Overflow: ${a.toString()} + ${b.toString()}`,
    );
  }
  return sum;
}

export function checkedSub(a: bigint, b: bigint): bigint {
  if (b > a) {
    throw new LedgerError(
      "ARITHMETIC_OVERFLOW",
      `Underflow: ${a.toString()} - ${b.toString()}`,
    );
  }
  return a - b;
}

/**
 * Parse a base-10 integer string ("1000") into a uint256.
 */
export function parseUint(value: string, label = "amount"): bigint {
  if (!/^\d+$/.test(value)) {
    throw new LedgerError("INVALID_AMOUNT", `${label} must be a base-10 integer, got "${value}"`);
  }
  return assertUint(BigInt(value), label);
}

/**
 * Parse a decimal string into a bigint scaled by decimals.
 *
 * "1.5" with decimals=18 → 1500000000000000000n
 * "100" with decimals=6 → 100000000n
 */
export function parseAmount(amount: string, decimals: number): bigint {
  const trimmed = amount.trim();

  if (!/^\d+(\.\d+)?$/.test(trimmed)) {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount format: "${amount}"`);
  }

  const [intPart = "0", fracPart = ""] = trimmed.split(".");

  if (fracPart.length > decimals) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `Amount "${trimmed}" has ${String(fracPart.length)} decimal places, but the token allows ${String(decimals)}`,
    );
  }

  return assertUint(BigInt(intPart + fracPart.padEnd(decimals, "0")));
}

/**
 * Convert a scaled bigint back to a decimal string, without trailing zeros.
 *
 * 1500000000000000000n with decimals=18 → "1.5"
 * 100000000n with decimals=6 → "100"
 */
export function formatAmount(scaled: bigint, decimals: number): string {
  assertUint(scaled);
  if (decimals === 0) {
    return scaled.toString();
  }

  const str = scaled.toString().padStart(decimals + 1, "0");
  const intPart = str.slice(0, str.length - decimals);
  const fracPart = str.slice(str.length - decimals).replace(/0+$/, "");

  return fracPart === "" ? intPart : `${intPart}.${fracPart}`;
}
