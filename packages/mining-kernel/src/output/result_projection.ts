// Mining Kernel - result projection (v1)
//
// Renders a MiningRunV1 as the MiningResultV1 wire document. This is the only
// place where relative support is written next to the absolute counts.
// Infinite conviction becomes null, since JSON has no Infinity.

import type { AssociationRuleRecordV1, FrequentLevelV1, MiningResultV1 } from "@cooccur/contracts";
import type { MiningRunV1 } from "../kernel";
import type { AssociationRuleV1 } from "../rules/rule_deriver";

function projectRule(rule: AssociationRuleV1): AssociationRuleRecordV1 {
  return {
    antecedent: [...rule.antecedent.items],
    consequent: [...rule.consequent.items],
    support: rule.support,
    confidence: rule.confidence,
    lift: rule.lift,
    leverage: rule.leverage,
    conviction: Number.isFinite(rule.conviction) ? rule.conviction : null,
    zhang: rule.zhang,
    jaccard: rule.jaccard,
    certainty: rule.certainty,
    kulczynski: rule.kulczynski
  };
}

export function projectMiningResultV1(run: MiningRunV1): MiningResultV1 {
  const levels: FrequentLevelV1[] = run.levels.map((level, index) => ({
    k: index + 1,
    itemsets: Array.from(level.values()).map(({ itemset, count }) => ({
      items: [...itemset.items],
      count,
      support: count / run.transactionCount
    }))
  }));

  return {
    type: "mining_result_v1",
    transaction_count: run.transactionCount,
    levels,
    rules: run.rules.map(projectRule),
    skipped: run.skipped.map((s) => ({
      antecedent: [...s.antecedent.items],
      consequent: [...s.consequent.items],
      reason: s.reason
    }))
  };
}
