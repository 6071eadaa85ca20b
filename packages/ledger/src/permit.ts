/**
 * @pegledger/ledger — EIP-712 signed messages.
 *
 * Two message types share one domain and one per-account nonce:
 *
 *   Permit(address owner,address spender,uint256 value,uint256 nonce,uint256 deadline)
 *   Delegation(address delegatee,uint256 nonce,uint256 expiry)
 *
 * The domain binds every signature to the ledger's name, version, chain
 * and address, so a signature for one ledger never verifies on another.
 *
 * Signature rules:
 * - exactly 65 bytes (r ‖ s ‖ v), v ∈ {27, 28}
 * - s in the lower half of the curve order
 * Anything else is INVALID_SIGNATURE.
 */

import {
  encodeAbiParameters,
  keccak256,
  recoverTypedDataAddress,
  toHex,
} from "viem";
import type { LocalAccount } from "viem";
import type { Address, Hex } from "./types.js";
import { LedgerError } from "./types.js";

// ─── Domain ──────────────────────────────────────────────────────────────

export interface SigningDomain {
  readonly name: string;
  readonly version: string;
  readonly chainId: number;
  readonly verifyingContract: Address;
}

const EIP712_DOMAIN_TYPEHASH = keccak256(
  toHex("EIP712Domain(string name,string version,uint256 chainId,address verifyingContract)"),
);

/**
 * keccak256 of the encoded domain, as a verifier computes it on chain.
 */
export function domainSeparator(domain: SigningDomain): Hex {
  return keccak256(
    encodeAbiParameters(
      [
        { type: "bytes32" },
        { type: "bytes32" },
        { type: "bytes32" },
        { type: "uint256" },
        { type: "address" },
      ],
      [
        EIP712_DOMAIN_TYPEHASH,
        keccak256(toHex(domain.name)),
        keccak256(toHex(domain.version)),
        BigInt(domain.chainId),
        domain.verifyingContract,
      ],
    ),
  );
}

// ─── Message types ───────────────────────────────────────────────────────

export const PERMIT_TYPES = {
  Permit: [
    { name: "owner", type: "address" },
    { name: "spender", type: "address" },
    { name: "value", type: "uint256" },
    { name: "nonce", type: "uint256" },
    { name: "deadline", type: "uint256" },
  ],
} as const;

export const DELEGATION_TYPES = {
  Delegation: [
    { name: "delegatee", type: "address" },
    { name: "nonce", type: "uint256" },
    { name: "expiry", type: "uint256" },
  ],
} as const;

export interface PermitMessage {
  readonly owner: Address;
  readonly spender: Address;
  readonly value: bigint;
  readonly nonce: bigint;
  readonly deadline: bigint;
}

export interface DelegationMessage {
  readonly delegatee: Address;
  readonly nonce: bigint;
  readonly expiry: bigint;
}

// ─── Signature checks ────────────────────────────────────────────────────

const SECP256K1_N_HALF =
  0x7fffffffffffffffffffffffffffffff5d576e7357a4501ddfe92f46681b20a0n;

const SIGNATURE_PATTERN = /^0x[0-9a-fA-F]{130}$/;

/**
 * Canonical (lower-case) form of a well-formed signature.
 *
 * @throws LedgerError INVALID_SIGNATURE if malformed or malleable
 */
export function assertSignature(signature: string): Hex {
  if (!SIGNATURE_PATTERN.test(signature)) {
    throw new LedgerError("INVALID_SIGNATURE", "Signature must be 65 bytes of hex");
  }

  const canonical: Hex = `0x${signature.slice(2).toLowerCase()}`;
  const s = BigInt(`0x${canonical.slice(66, 130)}`);
  const v = Number.parseInt(canonical.slice(130, 132), 16);

  if (s > SECP256K1_N_HALF) {
    throw new LedgerError("INVALID_SIGNATURE", "Signature s value is in the upper half of the curve order");
  }
  if (v !== 27 && v !== 28) {
    throw new LedgerError("INVALID_SIGNATURE", `Signature v value must be 27 or 28, got ${String(v)}`);
  }
  return canonical;
}

async function recoverOrReject(recover: () => Promise<Address>): Promise<Address> {
  try {
    return await recover();
  } catch (err) {
    throw new LedgerError(
      "INVALID_SIGNATURE",
      `Signature recovery failed: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
}

export function recoverPermitSigner(
  domain: SigningDomain,
  message: PermitMessage,
  signature: Hex,
): Promise<Address> {
  return recoverOrReject(() =>
    recoverTypedDataAddress({
      domain,
      types: PERMIT_TYPES,
      primaryType: "Permit",
      message,
      signature,
    }),
  );
}

export function recoverDelegationSigner(
  domain: SigningDomain,
  message: DelegationMessage,
  signature: Hex,
): Promise<Address> {
  return recoverOrReject(() =>
    recoverTypedDataAddress({
      domain,
      types: DELEGATION_TYPES,
      primaryType: "Delegation",
      message,
      signature,
    }),
  );
}

// ─── Client-side signing ─────────────────────────────────────────────────

/**
 * Sign a Permit with a local account (e.g. `privateKeyToAccount`).
 */
export function signPermit(
  account: LocalAccount,
  domain: SigningDomain,
  message: PermitMessage,
): Promise<Hex> {
  return account.signTypedData({
    domain,
    types: PERMIT_TYPES,
    primaryType: "Permit",
    message,
  });
}

export function signDelegation(
  account: LocalAccount,
  domain: SigningDomain,
  message: DelegationMessage,
): Promise<Hex> {
  return account.signTypedData({
    domain,
    types: DELEGATION_TYPES,
    primaryType: "Delegation",
    message,
  });
}
