/**
 * Address Types
 *
 * Account identifiers for the ledger.
 *
 * Rules:
 * - An account is a 20-byte hex string with a `0x` prefix
 * - The all-zero address is the null account: it never holds a balance
 * - Case is not significant; consumers normalize to checksum form
 */

/**
 * A `0x`-prefixed hex string.
 */
export type Hex = `0x${string}`;

/**
 * A 20-byte account identifier (`0x` + 40 hex characters).
 */
export type Address = `0x${string}`;

/**
 * The null account. Mints come from it and burns go to it.
 */
export const ZERO_ADDRESS: Address = "0x0000000000000000000000000000000000000000";
