/**
 * @pegledger/ledger — Block clock.
 *
 * Sequence points are block numbers. The host decides when a block is
 * mined; the ledger only reads the current number and time.
 */

import type { LedgerClock } from "./types.js";

/** ERC-6372 clock description for a block-number clock. */
export const CLOCK_MODE = "mode=blocknumber&from=default";

export interface BlockClockOptions {
  /** First block number. Default: 1 */
  readonly startBlock?: bigint;

  /** Millisecond time source. Default: Date.now */
  readonly now?: () => number;
}

export class BlockClock implements LedgerClock {
  private _number: bigint;
  private readonly _now: () => number;

  constructor(options?: BlockClockOptions) {
    this._number = options?.startBlock ?? 1n;
    this._now = options?.now ?? Date.now;
  }

  blockNumber(): bigint {
    return this._number;
  }

  timestamp(): bigint {
    return BigInt(Math.floor(this._now() / 1000));
  }

  /**
   * Close the current block. Returns the new block number.
   */
  mine(): bigint {
    this._number += 1n;
    return this._number;
  }
}
