// Mining Kernel - candidate generator (v1)
//
// Level-k candidates are every k-combination of the items seen in level k-1.
// There is deliberately no subset-frequency prune: a candidate is emitted even
// when some of its (k-1)-subsets were never frequent. Only the item universe
// is restricted.

import { Itemset } from "../itemsets/itemset";
import { MiningKernelError } from "../errors/kernel_error";
import type { FrequentLevel } from "./types";

/**
 * Distinct items appearing in any itemset of `previousLevel`, sorted.
 */
export function candidateUniverse(previousLevel: FrequentLevel): string[] {
  const universe = new Set<string>();
  for (const { itemset } of previousLevel.values()) {
    for (const item of itemset.items) universe.add(item);
  }
  return Array.from(universe).sort();
}

/**
 * Binomial coefficient C(n, k). Saturates to Infinity instead of wrapping.
 */
export function countCombinations(n: number, k: number): number {
  if (k < 0 || k > n) return 0;
  const r = Math.min(k, n - k);
  let out = 1;
  for (let i = 1; i <= r; i++) {
    out = (out * (n - r + i)) / i;
  }
  return Math.round(out);
}

/**
 * Throws CANDIDATE_LIMIT_EXCEEDED when a level would hold more than
 * `maxCandidates` itemsets. No limit when `maxCandidates` is undefined.
 */
export function assertCandidateLimitV1(
  candidateCount: number,
  k: number,
  maxCandidates: number | undefined,
  context: string
): void {
  if (maxCandidates !== undefined && candidateCount > maxCandidates) {
    throw new MiningKernelError(
      "CANDIDATE_LIMIT_EXCEEDED",
      `level ${k} has ${candidateCount} candidates, limit is ${maxCandidates}`,
      context
    );
  }
}

/**
 * Every combination of exactly `k` distinct items from the universe of `previousLevel`.
 * The count is checked against `maxCandidates` before any combination is built.
 */
export function generateCandidates(previousLevel: FrequentLevel, k: number, maxCandidates?: number): Itemset[] {
  if (!Number.isInteger(k) || k < 2) {
    throw new MiningKernelError("INVALID_LEVEL_SIZE", `k must be an integer >= 2, got ${k}`, "generateCandidates");
  }

  const universe = candidateUniverse(previousLevel);
  if (universe.length < k) return [];
  assertCandidateLimitV1(countCombinations(universe.length, k), k, maxCandidates, "generateCandidates");

  const out: Itemset[] = [];
  const picked: string[] = [];

  const walk = (start: number): void => {
    if (picked.length === k) {
      out.push(Itemset.of(picked));
      return;
    }
    // Stop early once too few items remain to fill the combination.
    const needed = k - picked.length;
    for (let i = start; i <= universe.length - needed; i++) {
      picked.push(universe[i]);
      walk(i + 1);
      picked.pop();
    }
  };

  walk(0);
  return out;
}
