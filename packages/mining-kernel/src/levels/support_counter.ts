// Mining Kernel - support counter (v1)
//
// Counts, for every candidate, the transactions containing it, then keeps the
// candidates whose relative support count / N reaches min_support.
//
// The scan can be split into contiguous transaction shards: per-shard raw
// counts merge by summation, and the threshold is applied once against the
// full N. Sharded and unsharded counting return the same level.

import type { Itemset, TransactionV1 } from "../itemsets/itemset";
import { assertMinSupportV1, assertNonEmptyTransactionsV1, assertPositiveIntV1 } from "../inputs/thresholds";
import type { FrequentLevel, LevelEntryV1, RawSupportCounts } from "./types";

/**
 * Unthresholded counts of every candidate over one list of transactions.
 * Candidates with zero hits are present with count 0.
 */
export function countRawSupport(
  candidates: ReadonlyArray<Itemset>,
  transactions: ReadonlyArray<TransactionV1>
): RawSupportCounts {
  const counts = new Map<string, LevelEntryV1>();
  for (const itemset of candidates) {
    if (counts.has(itemset.key)) continue;
    let count = 0;
    for (const transaction of transactions) {
      if (itemset.isSubsetOf(transaction)) count++;
    }
    counts.set(itemset.key, { itemset, count });
  }
  return counts;
}

/**
 * Sums two raw count maps. Commutative and associative; keys missing on one
 * side count as zero.
 */
export function mergeSupportCounts(a: RawSupportCounts, b: RawSupportCounts): RawSupportCounts {
  const out = new Map<string, LevelEntryV1>();
  for (const [key, entry] of a) out.set(key, { itemset: entry.itemset, count: entry.count });
  for (const [key, entry] of b) {
    const prev = out.get(key);
    out.set(key, { itemset: entry.itemset, count: (prev?.count ?? 0) + entry.count });
  }
  return out;
}

function applyThreshold(raw: RawSupportCounts, total: number, minSupport: number): FrequentLevel {
  const level = new Map<string, LevelEntryV1>();
  for (const [key, entry] of raw) {
    if (entry.count / total >= minSupport) level.set(key, entry);
  }
  return level;
}

/**
 * Frequent subset of `candidates`: those with count / N >= minSupport.
 */
export function countSupport(
  candidates: ReadonlyArray<Itemset>,
  transactions: ReadonlyArray<TransactionV1>,
  minSupport: number
): FrequentLevel {
  assertMinSupportV1(minSupport, "countSupport");
  assertNonEmptyTransactionsV1(transactions.length, "countSupport");
  return applyThreshold(countRawSupport(candidates, transactions), transactions.length, minSupport);
}

/**
 * Splits `transactions` into `shardCount` contiguous shards of near-equal size.
 */
export function shardTransactions(
  transactions: ReadonlyArray<TransactionV1>,
  shardCount: number
): ReadonlyArray<TransactionV1>[] {
  assertPositiveIntV1(shardCount, "shard_count", "shardTransactions");
  const size = Math.ceil(transactions.length / shardCount);
  const shards: ReadonlyArray<TransactionV1>[] = [];
  for (let start = 0; start < transactions.length; start += size) {
    shards.push(transactions.slice(start, start + size));
  }
  return shards;
}

/**
 * Same result as `countSupport`, computed shard by shard and merged.
 */
export function countSupportSharded(
  candidates: ReadonlyArray<Itemset>,
  transactions: ReadonlyArray<TransactionV1>,
  minSupport: number,
  shardCount: number
): FrequentLevel {
  assertMinSupportV1(minSupport, "countSupportSharded");
  assertNonEmptyTransactionsV1(transactions.length, "countSupportSharded");

  const merged = shardTransactions(transactions, shardCount)
    .map((shard) => countRawSupport(candidates, shard))
    .reduce<RawSupportCounts>((acc, counts) => mergeSupportCounts(acc, counts), new Map());

  return applyThreshold(merged, transactions.length, minSupport);
}
