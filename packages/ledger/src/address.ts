/**
 * @pegledger/ledger — Account identifiers.
 *
 * Every address entering the ledger is normalized to its EIP-55 checksum
 * form, so map keys compare by identity.
 */

import { getAddress, isAddress } from "viem";
import { ZERO_ADDRESS } from "@pegledger/types";
import type { Address } from "./types.js";
import { LedgerError } from "./types.js";

export { ZERO_ADDRESS };

/**
 * Normalize an address to checksum form.
 *
 * @throws LedgerError INVALID_ADDRESS if malformed
 */
export function normalizeAddress(value: string, label = "address"): Address {
  if (!isAddress(value, { strict: false })) {
    throw new LedgerError("INVALID_ADDRESS", `Invalid ${label}: "${value}"`, {
      [label]: value,
    });
  }
  return getAddress(value);
}

export function isZeroAddress(address: Address): boolean {
  return address === ZERO_ADDRESS;
}
