// Mining Kernel - transaction/item incidence graph (v1)
//
// Bipartite graph with one node per transaction and one node per item label,
// and an edge for every (transaction, item) membership.
//
// Node ids are namespaced ("txn#<index>", "item#<label>") so that an item
// label can never be mistaken for a transaction node.

import type { TransactionV1 } from "../itemsets/itemset";

export type IncidenceNodeV1 =
  | { kind: "transaction"; id: string; index: number }
  | { kind: "item"; id: string; label: string };

const TRANSACTION_PREFIX = "txn#";
const ITEM_PREFIX = "item#";

export function transactionNodeId(index: number): string {
  return `${TRANSACTION_PREFIX}${index}`;
}

export function itemNodeId(label: string): string {
  return `${ITEM_PREFIX}${label}`;
}

export class IncidenceGraph {
  private readonly nodes = new Map<string, IncidenceNodeV1>();
  private readonly adjacency = new Map<string, Set<string>>();

  static fromTransactions(transactions: ReadonlyArray<TransactionV1>): IncidenceGraph {
    const graph = new IncidenceGraph();
    transactions.forEach((transaction, index) => {
      const txnId = graph.addNode({ kind: "transaction", id: transactionNodeId(index), index });
      for (const label of transaction) {
        const itemId = graph.addNode({ kind: "item", id: itemNodeId(label), label });
        graph.addEdge(txnId, itemId);
      }
    });
    return graph;
  }

  private addNode(node: IncidenceNodeV1): string {
    if (!this.nodes.has(node.id)) {
      this.nodes.set(node.id, node);
      this.adjacency.set(node.id, new Set());
    }
    return node.id;
  }

  private addEdge(a: string, b: string): void {
    this.adjacency.get(a)?.add(b);
    this.adjacency.get(b)?.add(a);
  }

  degree(nodeId: string): number {
    return this.adjacency.get(nodeId)?.size ?? 0;
  }

  itemNodes(): IncidenceNodeV1[] {
    return Array.from(this.nodes.values()).filter((n) => n.kind === "item");
  }

  transactionNodes(): IncidenceNodeV1[] {
    return Array.from(this.nodes.values()).filter((n) => n.kind === "transaction");
  }

  /**
   * Item labels whose node has at least one incident transaction edge.
   */
  seedItems(): string[] {
    const out: string[] = [];
    for (const node of this.nodes.values()) {
      if (node.kind !== "item") continue;
      if (this.degree(node.id) > 0) out.push(node.label);
    }
    return out;
  }
}
