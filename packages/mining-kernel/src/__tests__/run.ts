// Test runner for @cooccur/mining-kernel.
//
// Plain scripts that throw on the first failed assertion; each imported
// module runs its own checks when loaded.

import assert from "node:assert";
import * as fs from "node:fs";
import * as path from "node:path";

import { MiningResultV1Z, TransactionV1Z } from "@cooccur/contracts";

import { runMiningV1 } from "../kernel";
import { toTransactionsV1 } from "../itemsets/itemset";
import { mineFrequentItemsets } from "../levels/level_miner";
import { projectMiningResultV1 } from "../output/result_projection";
import { projectConfigToOptionsV1 } from "../inputs/config_projector";
import { expectKernelError, FIVE_BASKETS, levelSummary } from "./helpers";

import "./incidence_graph";
import "./candidate_policy";
import "./support_counting";
import "./rule_derivation";

function readFixtureTransactions(name: string): string[][] {
  const abs = path.resolve(__dirname, "../../fixtures", name);
  return TransactionV1Z.array().parse(JSON.parse(fs.readFileSync(abs, "utf8")));
}

// --- Five-basket example ---
const example = runMiningV1(FIVE_BASKETS, { minSupport: 0.6, minConfidence: 0.6 });
assert.equal(example.transactionCount, 5);
assert.equal(example.levels.length, 2);
assert.deepStrictEqual(levelSummary(example.levels[0]), ["A=3", "B=3", "C=5"]);
assert.deepStrictEqual(levelSummary(example.levels[1]), ["A,C=3", "B,C=3"]);
assert.equal(example.rules.length, 4);
assert.equal(example.skipped.length, 0);
assert.ok(Object.isFrozen(example));

// --- Projection to the wire document ---
const doc = MiningResultV1Z.parse(projectMiningResultV1(example));
assert.deepStrictEqual(doc.levels.map((l) => l.k), [1, 2]);
assert.deepStrictEqual(doc.levels[0].itemsets.find((s) => s.items[0] === "C"), { items: ["C"], count: 5, support: 1 });
assert.deepStrictEqual(doc.rules[0].antecedent, ["A"]);
assert.deepStrictEqual(doc.rules[0].consequent, ["C"]);
assert.equal(doc.rules[0].conviction, null);
assert.equal(doc.rules[1].conviction, 1);

// --- Terminal cases ---
const noneFrequent = runMiningV1([["A"], ["B"], ["C"], ["D"]], { minSupport: 0.5, minConfidence: 0 });
assert.deepStrictEqual(noneFrequent.levels, []);
assert.deepStrictEqual(noneFrequent.rules, []);

const onlyC = runMiningV1(FIVE_BASKETS, { minSupport: 0.9, minConfidence: 0 });
assert.deepStrictEqual(onlyC.levels.map(levelSummary), [["C=5"]]);
assert.deepStrictEqual(onlyC.rules, []);

// maxK bounds the search from the caller's side.
const bounded = runMiningV1(FIVE_BASKETS, { minSupport: 0.6, minConfidence: 0, maxK: 1 });
assert.equal(bounded.levels.length, 1);
assert.equal(bounded.rules.length, 0);

// maxCandidates caps every level, the seed level included.
// At 0.2 all four items are frequent, so level 2 has C(4, 2) = 6 candidates.
assert.equal(runMiningV1(FIVE_BASKETS, { minSupport: 0.2, minConfidence: 0, maxCandidates: 6 }).levels.length, 3);
expectKernelError(
  () => runMiningV1(FIVE_BASKETS, { minSupport: 0.2, minConfidence: 0, maxCandidates: 5 }),
  "CANDIDATE_LIMIT_EXCEEDED"
);
assert.throws(
  () => runMiningV1(FIVE_BASKETS, { minSupport: 0.2, minConfidence: 0, maxCandidates: 3 }),
  /level 1 has 4 candidates, limit is 3 @ mineFrequentItemsets$/
);

// Repeated labels inside a transaction collapse.
const dup = runMiningV1([["A", "A", "B"], ["A"]], { minSupport: 0.5, minConfidence: 0 });
assert.deepStrictEqual(dup.levels.map(levelSummary), [["A=2", "B=1"], ["A,B=1"]]);

// --- Properties over a larger basket fixture ---
const baskets = toTransactionsV1(readFixtureTransactions("grocery_baskets_001.json"));
const minSupport = 0.3;
const levels = mineFrequentItemsets(baskets, { minSupport });
assert.deepStrictEqual(levelSummary(levels[0]), ["hummus=5", "kombucha=4", "oat_bar=4", "olives=4", "pita=5", "seltzer=5"]);

levels.forEach((level, index) => {
  for (const { itemset, count } of level.values()) {
    assert.ok(count / baskets.length >= minSupport, `${itemset.toString()} below min_support`);
    assert.equal(itemset.size, index + 1);
    if (index > 0) {
      const previousItems = new Set(Array.from(levels[index - 1].values()).flatMap((e) => [...e.itemset.items]));
      for (const item of itemset.items) assert.ok(previousItems.has(item), `${item} missing from level ${index}`);
    }
  }
});

// Idempotent, with or without shards.
const once = projectMiningResultV1(runMiningV1(baskets, { minSupport, minConfidence: 0.5 }));
const twice = projectMiningResultV1(runMiningV1(baskets, { minSupport, minConfidence: 0.5 }));
const sharded = projectMiningResultV1(runMiningV1(baskets, { minSupport, minConfidence: 0.5, shardCount: 3 }));
assert.deepStrictEqual(twice, once);
assert.deepStrictEqual(sharded, once);

const supportOf = new Map<string, number>();
for (const level of once.levels) {
  for (const s of level.itemsets) supportOf.set(JSON.stringify(s.items), s.support);
}
for (const rule of once.rules) {
  assert.ok(rule.confidence >= 0.5 && rule.confidence <= 1, "confidence out of range");
  const a = supportOf.get(JSON.stringify(rule.antecedent)) ?? 0;
  const c = supportOf.get(JSON.stringify(rule.consequent)) ?? 0;
  assert.ok(rule.support <= Math.min(a, c), "rule support exceeds a side's support");
}

// --- Config projection ---
assert.deepStrictEqual(
  projectConfigToOptionsV1({ schema_version: "1.0.0", min_support: 0.2, min_confidence: 0.5, max_k: null, shard_count: 2 }),
  { minSupport: 0.2, minConfidence: 0.5, shardCount: 2 }
);
assert.deepStrictEqual(
  projectConfigToOptionsV1({ schema_version: "1.0.0", min_support: 0.2, min_confidence: 0.5, max_k: 3, max_candidates: 500 }),
  { minSupport: 0.2, minConfidence: 0.5, maxK: 3, maxCandidates: 500 }
);

// --- Aborts before any scan ---
expectKernelError(() => runMiningV1(FIVE_BASKETS, { minSupport: 0, minConfidence: 0.5 }), "INVALID_THRESHOLD");
expectKernelError(() => runMiningV1(FIVE_BASKETS, { minSupport: 1.2, minConfidence: 0.5 }), "INVALID_THRESHOLD");
expectKernelError(() => runMiningV1(FIVE_BASKETS, { minSupport: 0.5, minConfidence: -0.1 }), "INVALID_THRESHOLD");
expectKernelError(() => runMiningV1(FIVE_BASKETS, { minSupport: 0.5, minConfidence: 0.5, maxK: 0 }), "INVALID_THRESHOLD");
expectKernelError(
  () => runMiningV1(FIVE_BASKETS, { minSupport: 0.5, minConfidence: 0.5, maxCandidates: 0 }),
  "INVALID_THRESHOLD"
);
expectKernelError(() => runMiningV1([], { minSupport: 0.5, minConfidence: 0.5 }), "EMPTY_TRANSACTION_SET");

console.log("mining-kernel tests ok");
