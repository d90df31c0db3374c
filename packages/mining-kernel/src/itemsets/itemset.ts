// Mining Kernel - Itemset value type (v1)
//
// An itemset is an unordered, duplicate-free collection of item labels.
// Items are kept sorted so that equal itemsets share one canonical key.

/**
 * Canonical key of an itemset: JSON array of its sorted items.
 * JSON quoting keeps labels containing separators unambiguous.
 */
export type ItemsetKey = string;

/**
 * A transaction is the set of item labels it contains.
 */
export type TransactionV1 = ReadonlySet<string>;

export class Itemset {
  public readonly items: ReadonlyArray<string>;
  public readonly key: ItemsetKey;

  private constructor(sortedItems: ReadonlyArray<string>) {
    this.items = Object.freeze(sortedItems);
    this.key = JSON.stringify(sortedItems);
  }

  static of(items: Iterable<string>): Itemset {
    const unique = Array.from(new Set(items)).sort();
    if (unique.length === 0) {
      throw new Error("itemset must contain at least one item");
    }
    return new Itemset(unique);
  }

  get size(): number {
    return this.items.length;
  }

  has(item: string): boolean {
    return this.items.includes(item);
  }

  /**
   * True when every item of this itemset is contained in `transaction`.
   */
  isSubsetOf(transaction: TransactionV1): boolean {
    for (const item of this.items) {
      if (!transaction.has(item)) return false;
    }
    return true;
  }

  /**
   * Items of this itemset that are not in `other`, or null when nothing remains.
   */
  without(other: Itemset): Itemset | null {
    const rest = this.items.filter((item) => !other.has(item));
    return rest.length === 0 ? null : new Itemset(rest);
  }

  equals(other: Itemset): boolean {
    return this.key === other.key;
  }

  toString(): string {
    return `{${this.items.join(", ")}}`;
  }
}

/**
 * Normalizes raw transactions into sets; repeated labels collapse.
 */
export function toTransactionsV1(raw: ReadonlyArray<Iterable<string>>): ReadonlyArray<TransactionV1> {
  return Object.freeze(raw.map((t): TransactionV1 => new Set(t)));
}
