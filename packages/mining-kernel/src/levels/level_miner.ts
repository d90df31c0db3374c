// Mining Kernel - level-wise miner (v1)
//
// seed (k=1) -> expand (k=2, 3, ...) -> terminal (empty level)
//
// Level 1 is counted over the incidence graph's seed items. Each following
// level is generated from the items of the level before it and counted; the
// first empty level ends the run and is not returned.

import { IncidenceGraph } from "../graph/incidence_graph";
import { Itemset } from "../itemsets/itemset";
import type { TransactionV1 } from "../itemsets/itemset";
import { assertMinSupportV1, assertNonEmptyTransactionsV1, assertPositiveIntV1 } from "../inputs/thresholds";
import { assertCandidateLimitV1, generateCandidates } from "./candidate_generator";
import { countSupport, countSupportSharded } from "./support_counter";
import type { FrequentLevel } from "./types";

export interface MineOptionsV1 {
  minSupport: number;
  // Largest itemset size to mine; unbounded when omitted.
  maxK?: number;
  // Contiguous transaction shards per support scan; 1 when omitted.
  shardCount?: number;
  // Most candidates any single level may hold; the run aborts with
  // CANDIDATE_LIMIT_EXCEEDED above it. Unbounded when omitted.
  maxCandidates?: number;
}

/**
 * Frequent itemset levels 1..L, ordered by itemset size with no gaps.
 * Returns [] when no single item reaches min_support.
 */
export function mineFrequentItemsets(
  transactions: ReadonlyArray<TransactionV1>,
  options: MineOptionsV1
): FrequentLevel[] {
  const { minSupport, maxK, shardCount = 1, maxCandidates } = options;
  assertMinSupportV1(minSupport, "mineFrequentItemsets");
  if (maxK !== undefined) assertPositiveIntV1(maxK, "max_k", "mineFrequentItemsets");
  assertPositiveIntV1(shardCount, "shard_count", "mineFrequentItemsets");
  if (maxCandidates !== undefined) assertPositiveIntV1(maxCandidates, "max_candidates", "mineFrequentItemsets");
  assertNonEmptyTransactionsV1(transactions.length, "mineFrequentItemsets");

  const count = (candidates: Itemset[]): FrequentLevel =>
    shardCount > 1
      ? countSupportSharded(candidates, transactions, minSupport, shardCount)
      : countSupport(candidates, transactions, minSupport);

  const seeds = IncidenceGraph.fromTransactions(transactions)
    .seedItems()
    .map((item) => Itemset.of([item]));
  assertCandidateLimitV1(seeds.length, 1, maxCandidates, "mineFrequentItemsets");

  const levels: FrequentLevel[] = [];
  let current = count(seeds);
  let k = 1;

  while (current.size > 0) {
    levels.push(current);
    if (maxK !== undefined && k >= maxK) break;
    k++;
    current = count(generateCandidates(current, k, maxCandidates));
  }

  return levels;
}
