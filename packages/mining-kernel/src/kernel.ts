// Mining Kernel - pure evaluation entrypoint (v1)
//
// This module exports a single pure function that:
// 1) Normalizes raw transactions into sets.
// 2) Validates every threshold and N > 0 before any scan.
// 3) Mines frequent itemset levels.
// 4) Derives association rules from those levels.
//
// No IO. No side effects.

import { toTransactionsV1 } from "./itemsets/itemset";
import {
  assertFiniteV1,
  assertMinConfidenceV1,
  assertMinSupportV1,
  assertNonEmptyTransactionsV1,
  assertPositiveIntV1
} from "./inputs/thresholds";
import type { MiningRunOptionsV1 } from "./inputs/config_projector";
import { mineFrequentItemsets } from "./levels/level_miner";
import type { FrequentLevel } from "./levels/types";
import { deriveRulesWithDiagnostics } from "./rules/rule_deriver";
import type { AssociationRuleV1, SkippedRuleV1 } from "./rules/rule_deriver";

export interface MiningRunV1 {
  transactionCount: number;
  levels: ReadonlyArray<FrequentLevel>;
  rules: ReadonlyArray<AssociationRuleV1>;
  skipped: ReadonlyArray<SkippedRuleV1>;
}

/**
 * Mines frequent itemsets and derives rules in one pass over the same input.
 *
 * @param rawTransactions - Item labels per transaction; repeats collapse.
 * @returns Frozen run result with absolute counts per level.
 */
export function runMiningV1(
  rawTransactions: ReadonlyArray<Iterable<string>>,
  options: MiningRunOptionsV1
): MiningRunV1 {
  // Abort on bad configuration before the first scan, including rule options.
  assertMinSupportV1(options.minSupport, "runMiningV1");
  assertMinConfidenceV1(options.minConfidence, "runMiningV1");
  if (options.maxK !== undefined) assertPositiveIntV1(options.maxK, "max_k", "runMiningV1");
  if (options.shardCount !== undefined) assertPositiveIntV1(options.shardCount, "shard_count", "runMiningV1");
  if (options.maxCandidates !== undefined) assertPositiveIntV1(options.maxCandidates, "max_candidates", "runMiningV1");
  if (options.minLift !== undefined) assertFiniteV1(options.minLift, "min_lift", "runMiningV1");
  if (options.minLeverage !== undefined) assertFiniteV1(options.minLeverage, "min_leverage", "runMiningV1");
  assertNonEmptyTransactionsV1(rawTransactions.length, "runMiningV1");

  const transactions = toTransactionsV1(rawTransactions);
  const levels = mineFrequentItemsets(transactions, options);
  const { rules, skipped } = deriveRulesWithDiagnostics(levels, transactions, options);

  return Object.freeze({
    transactionCount: transactions.length,
    levels: Object.freeze(levels),
    rules: Object.freeze(rules),
    skipped: Object.freeze(skipped)
  });
}
