/**
 * @pegledger/ledger — Checkpoint series.
 *
 * A series is ordered by key (sequence point), keys strictly increasing.
 * Writing twice at the same key replaces the latest value; a key lower
 * than the latest is refused.
 */

import type { Journal } from "./journal.js";
import type { Checkpoint } from "./types.js";
import { LedgerError } from "./types.js";

/**
 * Record `votes` at `key`. Returns the previous and new latest values.
 */
export function pushCheckpoint(
  journal: Journal,
  series: Checkpoint[],
  key: bigint,
  votes: bigint,
): readonly [previous: bigint, next: bigint] {
  const last = series.at(-1);

  if (last === undefined) {
    journal.push(series, { key, votes });
    return [0n, votes];
  }

  if (last.key > key) {
    throw new LedgerError(
      "UNORDERED_CHECKPOINT",
      `Checkpoint key ${key.toString()} is before the latest key ${last.key.toString()}`,
    );
  }

  if (last.key === key) {
    journal.replaceLast(series, { key, votes });
  } else {
    journal.push(series, { key, votes });
  }
  return [last.votes, votes];
}

export function latestCheckpoint(series: readonly Checkpoint[]): bigint {
  return series.at(-1)?.votes ?? 0n;
}

/**
 * Value of the last checkpoint with key ≤ `key`, or zero.
 */
export function upperLookup(series: readonly Checkpoint[], key: bigint): bigint {
  let low = 0;
  let high = series.length;

  // first index whose key is > `key`
  while (low < high) {
    const mid = (low + high) >>> 1;
    const entry = series[mid];
    if (entry !== undefined && entry.key > key) {
      high = mid;
    } else {
      low = mid + 1;
    }
  }

  return high === 0 ? 0n : (series[high - 1]?.votes ?? 0n);
}
