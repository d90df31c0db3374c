// Shared helpers for the mining-kernel test scripts.

import assert from "node:assert";

import { Itemset } from "../itemsets/itemset";
import type { FrequentLevel, LevelEntryV1 } from "../levels/types";
import { isMiningKernelError } from "../errors/kernel_error";

// Transactions of the five-basket example used across the scripts.
export const FIVE_BASKETS: string[][] = [
  ["A", "B", "C"],
  ["A", "C"],
  ["B", "C", "D"],
  ["A", "C", "D"],
  ["B", "C"]
];

export function levelOf(entries: Array<[string[], number]>): FrequentLevel {
  const level = new Map<string, LevelEntryV1>();
  for (const [items, count] of entries) {
    const itemset = Itemset.of(items);
    level.set(itemset.key, { itemset, count });
  }
  return level;
}

// Level as sorted "a,b=count" strings, for order-free comparisons.
export function levelSummary(level: FrequentLevel): string[] {
  return Array.from(level.values())
    .map((e) => `${e.itemset.items.join(",")}=${e.count}`)
    .sort();
}

export function assertClose(actual: number, expected: number, label: string): void {
  assert.ok(Math.abs(actual - expected) < 1e-9, `${label}: expected ${expected}, got ${actual}`);
}

// Expect a function to throw a MiningKernelError with the given code.
export function expectKernelError(fn: () => unknown, code: string): void {
  let threw = false;
  try {
    fn();
  } catch (err: unknown) {
    threw = true;
    assert.ok(isMiningKernelError(err), `expected MiningKernelError, got ${String(err)}`);
    assert.equal(err.code, code);
    assert.ok(err.message.startsWith(`${code}: `), `unexpected message "${err.message}"`);
  }
  assert.ok(threw, `expected throw with code "${code}", but no error was thrown`);
}
