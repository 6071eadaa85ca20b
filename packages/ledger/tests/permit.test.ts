/**
 * Tests for signed approvals (Permit) and signed delegation.
 *
 * Verifies:
 * - Domain separator matches the EIP-712 digest viem computes
 * - Check order: deadline, signature shape/reuse, signer
 * - Nonce increments once per accepted message, shared by both types
 * - Verbatim replay fails with INVALID_SIGNATURE
 */

import { describe, it, expect } from "vitest";
import { concat, encodeAbiParameters, hashTypedData, keccak256, toHex } from "viem";
import type { Hex } from "viem";
import {
  domainSeparator,
  PERMIT_TYPES,
  signDelegation,
  signPermit,
} from "../src/permit.js";
import type { PermitMessage } from "../src/permit.js";
import type { PegLedger } from "../src/ledger.js";
import {
  ALICE,
  BOB,
  CAROL,
  createTestLedger,
  expectLedgerRejection,
  NOW_SECONDS,
} from "./setup.js";

const SECP256K1_N =
  0xfffffffffffffffffffffffffffffffebaaedce6af48a03bbfd25e8cd0364141n;

function permitFor(ledger: PegLedger, overrides?: Partial<PermitMessage>): PermitMessage {
  return {
    owner: ALICE.address,
    spender: BOB.address,
    value: 400n,
    nonce: ledger.nonces(ALICE.address),
    deadline: NOW_SECONDS + 3600n,
    ...overrides,
  };
}

/** The same signature with s mirrored into the upper half. */
function malleate(signature: Hex): Hex {
  const r = signature.slice(2, 66);
  const s = BigInt(`0x${signature.slice(66, 130)}`);
  const v = signature.slice(130, 132) === "1b" ? "1c" : "1b";
  return `0x${r}${(SECP256K1_N - s).toString(16).padStart(64, "0")}${v}`;
}

// =============================================================================
// Domain
// =============================================================================

describe("domain separator", () => {
  it("matches the digest viem builds for a Permit", () => {
    const { ledger } = createTestLedger();
    const message = permitFor(ledger);

    const permitTypehash = keccak256(
      toHex("Permit(address owner,address spender,uint256 value,uint256 nonce,uint256 deadline)"),
    );
    const structHash = keccak256(
      encodeAbiParameters(
        [
          { type: "bytes32" },
          { type: "address" },
          { type: "address" },
          { type: "uint256" },
          { type: "uint256" },
          { type: "uint256" },
        ],
        [
          permitTypehash,
          message.owner,
          message.spender,
          message.value,
          message.nonce,
          message.deadline,
        ],
      ),
    );

    expect(keccak256(concat(["0x1901", ledger.DOMAIN_SEPARATOR(), structHash]))).toBe(
      hashTypedData({
        domain: ledger.signingDomain(),
        types: PERMIT_TYPES,
        primaryType: "Permit",
        message,
      }),
    );
  });

  it("binds the chain id and ledger address", () => {
    const { ledger } = createTestLedger();
    const domain = ledger.signingDomain();

    expect(domainSeparator({ ...domain, chainId: 1 })).not.toBe(ledger.DOMAIN_SEPARATOR());
    expect(domainSeparator({ ...domain, verifyingContract: CAROL.address })).not.toBe(
      ledger.DOMAIN_SEPARATOR(),
    );
  });

  it("describes itself per ERC-5267", () => {
    const { ledger } = createTestLedger();
    expect(ledger.eip712Domain()).toEqual({
      fields: "0x0f",
      name: "Wrapped Ether",
      version: "1",
      chainId: 31337,
      verifyingContract: ledger.address,
      salt: `0x${"0".repeat(64)}`,
      extensions: [],
    });
  });
});

// =============================================================================
// approveBySignature
// =============================================================================

describe("approveBySignature", () => {
  it("approves, bumps the nonce once and emits Approval", async () => {
    const { ledger, events } = createTestLedger();
    const message = permitFor(ledger);
    const signature = await signPermit(ALICE, ledger.signingDomain(), message);

    await ledger.approveBySignature(
      ALICE.address,
      BOB.address,
      message.value,
      message.deadline,
      signature,
    );

    expect(ledger.allowance(ALICE.address, BOB.address)).toBe(400n);
    expect(ledger.nonces(ALICE.address)).toBe(1n);
    expect(events).toEqual([
      { eventName: "Approval", args: { owner: ALICE.address, spender: BOB.address, value: 400n } },
    ]);
  });

  it("rejects a verbatim replay with INVALID_SIGNATURE", async () => {
    const { ledger } = createTestLedger();
    const message = permitFor(ledger);
    const signature = await signPermit(ALICE, ledger.signingDomain(), message);
    const submit = (): Promise<void> =>
      ledger.approveBySignature(ALICE.address, BOB.address, 400n, message.deadline, signature);

    await submit();
    ledger.approve(ALICE.address, BOB.address, 0n);

    await expectLedgerRejection(submit(), "INVALID_SIGNATURE");
    expect(ledger.nonces(ALICE.address)).toBe(1n);
    expect(ledger.allowance(ALICE.address, BOB.address)).toBe(0n);
  });

  it("rejects the upper-s twin of a valid signature", async () => {
    const { ledger } = createTestLedger();
    const message = permitFor(ledger);
    const signature = await signPermit(ALICE, ledger.signingDomain(), message);

    await expectLedgerRejection(
      ledger.approveBySignature(
        ALICE.address,
        BOB.address,
        400n,
        message.deadline,
        malleate(signature),
      ),
      "INVALID_SIGNATURE",
    );
    expect(ledger.nonces(ALICE.address)).toBe(0n);
  });

  it("checks the deadline before anything else", async () => {
    const { ledger } = createTestLedger();
    await expectLedgerRejection(
      ledger.approveBySignature(ALICE.address, BOB.address, 1n, NOW_SECONDS - 1n, "0x00"),
      "EXPIRED_DEADLINE",
    );
  });

  it("accepts a deadline equal to the current time", async () => {
    const { ledger } = createTestLedger();
    const message = permitFor(ledger, { deadline: NOW_SECONDS });
    const signature = await signPermit(ALICE, ledger.signingDomain(), message);

    await ledger.approveBySignature(ALICE.address, BOB.address, 400n, NOW_SECONDS, signature);
    expect(ledger.allowance(ALICE.address, BOB.address)).toBe(400n);
  });

  it("rejects malformed signatures", async () => {
    const { ledger } = createTestLedger();
    const deadline = NOW_SECONDS + 10n;

    for (const bad of ["0x1234", "not-hex", `0x${"ab".repeat(64)}00`]) {
      await expectLedgerRejection(
        ledger.approveBySignature(ALICE.address, BOB.address, 1n, deadline, bad),
        "INVALID_SIGNATURE",
      );
    }
  });

  it("rejects a signature by someone other than the owner", async () => {
    const { ledger } = createTestLedger();
    const message = permitFor(ledger);
    const signature = await signPermit(CAROL, ledger.signingDomain(), message);

    await expectLedgerRejection(
      ledger.approveBySignature(ALICE.address, BOB.address, 400n, message.deadline, signature),
      "INVALID_SIGNER",
    );
    expect(ledger.nonces(ALICE.address)).toBe(0n);
  });

  it("rejects a signature made for another chain", async () => {
    const { ledger } = createTestLedger();
    const message = permitFor(ledger);
    const signature = await signPermit(ALICE, { ...ledger.signingDomain(), chainId: 1 }, message);

    await expectLedgerRejection(
      ledger.approveBySignature(ALICE.address, BOB.address, 400n, message.deadline, signature),
      "INVALID_SIGNER",
    );
  });

  it("rejects a signature over different terms", async () => {
    const { ledger } = createTestLedger();
    const message = permitFor(ledger);
    const signature = await signPermit(ALICE, ledger.signingDomain(), message);

    await expectLedgerRejection(
      ledger.approveBySignature(ALICE.address, BOB.address, 401n, message.deadline, signature),
      "INVALID_SIGNER",
    );
  });
});

// =============================================================================
// delegateBySignature
// =============================================================================

describe("delegateBySignature", () => {
  it("delegates on behalf of the signer", async () => {
    const { ledger, events } = createTestLedger();
    ledger.depositValue(ALICE.address, 100n);
    events.length = 0;

    const expiry = NOW_SECONDS + 60n;
    const signature = await signDelegation(ALICE, ledger.signingDomain(), {
      delegatee: BOB.address,
      nonce: 0n,
      expiry,
    });

    const signer = await ledger.delegateBySignature(BOB.address, 0n, expiry, signature);

    expect(signer).toBe(ALICE.address);
    expect(ledger.delegates(ALICE.address)).toBe(BOB.address);
    expect(ledger.getVotes(BOB.address)).toBe(100n);
    expect(ledger.nonces(ALICE.address)).toBe(1n);
    expect(events.map((e) => e.eventName)).toEqual(["DelegateChanged", "DelegateVotesChanged"]);
  });

  it("shares the nonce with Permit", async () => {
    const { ledger } = createTestLedger();
    const permit = permitFor(ledger);
    await ledger.approveBySignature(
      ALICE.address,
      BOB.address,
      permit.value,
      permit.deadline,
      await signPermit(ALICE, ledger.signingDomain(), permit),
    );

    const expiry = NOW_SECONDS + 60n;
    const stale = await signDelegation(ALICE, ledger.signingDomain(), {
      delegatee: BOB.address,
      nonce: 0n,
      expiry,
    });

    await expectLedgerRejection(
      ledger.delegateBySignature(BOB.address, 0n, expiry, stale),
      "INVALID_SIGNER",
    );
    expect(ledger.delegates(ALICE.address)).toBe("0x0000000000000000000000000000000000000000");
  });

  it("rejects expired and replayed delegations", async () => {
    const { ledger } = createTestLedger();
    const expiry = NOW_SECONDS + 60n;
    const signature = await signDelegation(ALICE, ledger.signingDomain(), {
      delegatee: BOB.address,
      nonce: 0n,
      expiry,
    });

    await expectLedgerRejection(
      ledger.delegateBySignature(BOB.address, 0n, NOW_SECONDS - 1n, signature),
      "EXPIRED_DEADLINE",
    );

    await ledger.delegateBySignature(BOB.address, 0n, expiry, signature);
    await expectLedgerRejection(
      ledger.delegateBySignature(BOB.address, 0n, expiry, signature),
      "INVALID_SIGNATURE",
    );
  });
});
