/**
 * @pegledger/ledger — Event ABI.
 *
 * The standard token event signatures, with their indexed flags, so an
 * indexer decoding `{ topics, data }` sees the same logs it would read
 * from a deployed wrapped-asset token.
 */

import { encodeAbiParameters, encodeEventTopics, parseAbi } from "viem";
import type { Hex, LedgerEvent } from "./types.js";

export const LEDGER_EVENT_ABI = parseAbi([
  "event Transfer(address indexed from, address indexed to, uint256 value)",
  "event Approval(address indexed owner, address indexed spender, uint256 value)",
  "event Deposit(address indexed dst, uint256 wad)",
  "event Withdrawal(address indexed src, uint256 wad)",
  "event DelegateChanged(address indexed delegator, address indexed fromDelegate, address indexed toDelegate)",
  "event DelegateVotesChanged(address indexed delegate, uint256 previousVotes, uint256 newVotes)",
]);

export interface EncodedLog {
  readonly topics: readonly Hex[];
  readonly data: Hex;
}

const UINT256 = [{ type: "uint256" }] as const;
const TWO_UINT256 = [{ type: "uint256" }, { type: "uint256" }] as const;

function onlyTopics(topics: readonly (Hex | readonly Hex[] | null)[]): Hex[] {
  return topics.filter((t): t is Hex => typeof t === "string");
}

/**
 * Render a ledger event as a log: topic0 is the event selector, indexed
 * arguments follow as topics, the rest is ABI-encoded data.
 */
export function encodeLedgerLog(event: LedgerEvent): EncodedLog {
  switch (event.eventName) {
    case "Transfer":
      return {
        topics: onlyTopics(
          encodeEventTopics({
            abi: LEDGER_EVENT_ABI,
            eventName: "Transfer",
            args: { from: event.args.from, to: event.args.to },
          }),
        ),
        data: encodeAbiParameters(UINT256, [event.args.value]),
      };
    case "Approval":
      return {
        topics: onlyTopics(
          encodeEventTopics({
            abi: LEDGER_EVENT_ABI,
            eventName: "Approval",
            args: { owner: event.args.owner, spender: event.args.spender },
          }),
        ),
        data: encodeAbiParameters(UINT256, [event.args.value]),
      };
    case "Deposit":
      return {
        topics: onlyTopics(
          encodeEventTopics({
            abi: LEDGER_EVENT_ABI,
            eventName: "Deposit",
            args: { dst: event.args.dst },
          }),
        ),
        data: encodeAbiParameters(UINT256, [event.args.wad]),
      };
    case "Withdrawal":
      return {
        topics: onlyTopics(
          encodeEventTopics({
            abi: LEDGER_EVENT_ABI,
            eventName: "Withdrawal",
            args: { src: event.args.src },
          }),
        ),
        data: encodeAbiParameters(UINT256, [event.args.wad]),
      };
    case "DelegateChanged":
      return {
        topics: onlyTopics(
          encodeEventTopics({
            abi: LEDGER_EVENT_ABI,
            eventName: "DelegateChanged",
            args: {
              delegator: event.args.delegator,
              fromDelegate: event.args.fromDelegate,
              toDelegate: event.args.toDelegate,
            },
          }),
        ),
        data: "0x",
      };
    case "DelegateVotesChanged":
      return {
        topics: onlyTopics(
          encodeEventTopics({
            abi: LEDGER_EVENT_ABI,
            eventName: "DelegateVotesChanged",
            args: { delegate: event.args.delegate },
          }),
        ),
        data: encodeAbiParameters(TWO_UINT256, [
          event.args.previousVotes,
          event.args.newVotes,
        ]),
      };
  }
}
