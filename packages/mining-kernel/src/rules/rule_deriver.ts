// Mining Kernel - association rule deriver (v1)
//
// For every frequent itemset F with |F| >= 2 and every nonempty proper subset
// A of F, scores the rule A -> F \ A from the flattened level counts.
//
// Rules that cannot be scored are skipped, never fabricated:
// - MISSING_SUBSET_SUPPORT: A or C has no count in the levels
// - UNDEFINED_METRIC: A or C has zero support

import { Itemset } from "../itemsets/itemset";
import type { ItemsetKey, TransactionV1 } from "../itemsets/itemset";
import { MiningKernelError } from "../errors/kernel_error";
import type { RuleSkipReasonV1 } from "../errors/kernel_error";
import { assertFiniteV1, assertMinConfidenceV1, assertNonEmptyTransactionsV1 } from "../inputs/thresholds";
import type { FrequentLevel, LevelEntryV1 } from "../levels/types";
import { computeRuleMetricsV1 } from "./rule_metrics";
import type { RuleMetricsV1 } from "./rule_metrics";

export interface AssociationRuleV1 extends RuleMetricsV1 {
  antecedent: Itemset;
  consequent: Itemset;
}

export interface SkippedRuleV1 {
  antecedent: Itemset;
  consequent: Itemset;
  reason: RuleSkipReasonV1;
}

export interface DeriveRulesOptionsV1 {
  minConfidence: number;
  // Optional floors; not applied unless given.
  minLift?: number;
  minLeverage?: number;
}

export interface RuleDerivationV1 {
  rules: AssociationRuleV1[];
  skipped: SkippedRuleV1[];
}

/**
 * One map over all levels. A later level's entry replaces an earlier one with
 * the same key.
 */
export function flattenLevels(levels: ReadonlyArray<FrequentLevel>): Map<ItemsetKey, LevelEntryV1> {
  const out = new Map<ItemsetKey, LevelEntryV1>();
  for (const level of levels) {
    for (const [key, entry] of level) out.set(key, entry);
  }
  return out;
}

// Antecedent masks are 32-bit ints; bit 31 is the sign bit.
export const MAX_SPLIT_ITEMS = 30;

/**
 * Every split (A, F \ A) with A a nonempty proper subset of F, by ascending
 * bitmask over F's sorted items. Throws INVALID_LEVEL_SIZE above MAX_SPLIT_ITEMS.
 */
export function enumerateSplits(itemset: Itemset): Array<[Itemset, Itemset]> {
  const items = itemset.items;
  const n = items.length;
  if (n > MAX_SPLIT_ITEMS) {
    throw new MiningKernelError(
      "INVALID_LEVEL_SIZE",
      `cannot split an itemset of ${n} items, at most ${MAX_SPLIT_ITEMS}`,
      "enumerateSplits"
    );
  }

  const out: Array<[Itemset, Itemset]> = [];
  for (let mask = 1; mask < (1 << n) - 1; mask++) {
    const antecedent = Itemset.of(items.filter((_, j) => (mask & (1 << j)) !== 0));
    const consequent = itemset.without(antecedent);
    if (consequent === null) continue;
    out.push([antecedent, consequent]);
  }
  return out;
}

export function deriveRulesWithDiagnostics(
  levels: ReadonlyArray<FrequentLevel>,
  transactions: ReadonlyArray<TransactionV1>,
  options: DeriveRulesOptionsV1
): RuleDerivationV1 {
  const { minConfidence, minLift, minLeverage } = options;
  assertMinConfidenceV1(minConfidence, "deriveRules");
  if (minLift !== undefined) assertFiniteV1(minLift, "min_lift", "deriveRules");
  if (minLeverage !== undefined) assertFiniteV1(minLeverage, "min_leverage", "deriveRules");
  assertNonEmptyTransactionsV1(transactions.length, "deriveRules");

  const total = transactions.length;
  const frequent = flattenLevels(levels);
  const rules: AssociationRuleV1[] = [];
  const skipped: SkippedRuleV1[] = [];

  for (const { itemset, count } of frequent.values()) {
    if (itemset.size < 2) continue;

    for (const [antecedent, consequent] of enumerateSplits(itemset)) {
      const antecedentCount = frequent.get(antecedent.key)?.count;
      const consequentCount = frequent.get(consequent.key)?.count;
      if (antecedentCount === undefined || consequentCount === undefined) {
        skipped.push({ antecedent, consequent, reason: "MISSING_SUBSET_SUPPORT" });
        continue;
      }
      if (antecedentCount === 0 || consequentCount === 0) {
        skipped.push({ antecedent, consequent, reason: "UNDEFINED_METRIC" });
        continue;
      }

      const metrics = computeRuleMetricsV1(count / total, antecedentCount / total, consequentCount / total);
      if (metrics.confidence < minConfidence) continue;
      if (minLift !== undefined && metrics.lift < minLift) continue;
      if (minLeverage !== undefined && metrics.leverage < minLeverage) continue;

      rules.push({ antecedent, consequent, ...metrics });
    }
  }

  return { rules, skipped };
}

/**
 * Rules with confidence >= minConfidence (and the optional lift/leverage floors).
 */
export function deriveRules(
  levels: ReadonlyArray<FrequentLevel>,
  transactions: ReadonlyArray<TransactionV1>,
  options: DeriveRulesOptionsV1
): AssociationRuleV1[] {
  return deriveRulesWithDiagnostics(levels, transactions, options).rules;
}
