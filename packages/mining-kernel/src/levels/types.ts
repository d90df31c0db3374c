// Mining Kernel - level types (v1)

import type { Itemset, ItemsetKey } from "../itemsets/itemset";

/**
 * One frequent itemset with its absolute support count.
 */
export interface LevelEntryV1 {
  itemset: Itemset;
  count: number;
}

/**
 * All frequent itemsets of one size k, keyed by canonical itemset key.
 * Counts are absolute; relative support is count / N.
 */
export type FrequentLevel = ReadonlyMap<ItemsetKey, LevelEntryV1>;

/**
 * Unthresholded per-candidate counts, as produced for one transaction shard.
 */
export type RawSupportCounts = ReadonlyMap<ItemsetKey, LevelEntryV1>;
