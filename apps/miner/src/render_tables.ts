// Console tables for mined levels and rules.

import type { AssociationRuleV1, FrequentLevel } from "@cooccur/mining-kernel";

function formatItems(items: ReadonlyArray<string>): string {
  return items.join(", ");
}

/**
 * One block per level: a "k=<k>" header, then "<items>  <count>  <support>"
 * rows ordered by count (descending), then by itemset key.
 */
export function renderLevelsTable(levels: ReadonlyArray<FrequentLevel>, transactionCount: number): string {
  const lines: string[] = [];
  levels.forEach((level, index) => {
    lines.push(`k=${index + 1} (${level.size} itemsets)`);
    const entries = Array.from(level.values()).sort(
      (a, b) => b.count - a.count || (a.itemset.key < b.itemset.key ? -1 : a.itemset.key > b.itemset.key ? 1 : 0)
    );
    const labels = entries.map((e) => formatItems(e.itemset.items));
    const labelWidth = labels.reduce((w, l) => Math.max(w, l.length), 0);
    const countWidth = entries.reduce((w, e) => Math.max(w, String(e.count).length), 0);
    entries.forEach((e, i) => {
      const support = (e.count / transactionCount).toFixed(2);
      lines.push(`  ${labels[i].padEnd(labelWidth)}  ${String(e.count).padStart(countWidth)}  ${support}`);
    });
  });
  return lines.join("\n");
}

function formatConviction(value: number): string {
  return Number.isFinite(value) ? value.toFixed(2) : "inf";
}

/**
 * Rules ordered by confidence, then lift (both descending), at most `limit` rows.
 */
export function renderRulesTable(rules: ReadonlyArray<AssociationRuleV1>, limit = 20): string {
  if (rules.length === 0) return "no rules";
  const sorted = [...rules].sort((a, b) => b.confidence - a.confidence || b.lift - a.lift);
  return sorted
    .slice(0, limit)
    .map(
      (r) =>
        `{${formatItems(r.antecedent.items)}} -> {${formatItems(r.consequent.items)}}` +
        `  supp=${r.support.toFixed(2)} conf=${r.confidence.toFixed(2)} lift=${r.lift.toFixed(2)}` +
        ` lev=${r.leverage.toFixed(2)} conv=${formatConviction(r.conviction)}`
    )
    .join("\n");
}
