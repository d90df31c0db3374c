// Incidence graph: seed items come from the item side of the graph only.

import assert from "node:assert";

import { IncidenceGraph, itemNodeId, transactionNodeId } from "../graph/incidence_graph";
import { toTransactionsV1 } from "../itemsets/itemset";
import { FIVE_BASKETS } from "./helpers";

// Seed items are the distinct items, in first-seen order.
const graph = IncidenceGraph.fromTransactions(toTransactionsV1(FIVE_BASKETS));
assert.deepStrictEqual(graph.seedItems(), ["A", "B", "C", "D"]);
assert.equal(graph.transactionNodes().length, 5);
assert.equal(graph.itemNodes().length, 4);
assert.equal(graph.degree(itemNodeId("C")), 5);
assert.equal(graph.degree(itemNodeId("D")), 2);
assert.equal(graph.degree(transactionNodeId(0)), 3);
assert.equal(graph.degree(itemNodeId("missing")), 0);

// An item label shaped like a transaction node id stays an item.
const tricky = IncidenceGraph.fromTransactions(toTransactionsV1([["txn#0", "A"], ["A"]]));
assert.deepStrictEqual(tricky.seedItems(), ["txn#0", "A"]);
assert.equal(tricky.transactionNodes().length, 2);
assert.equal(tricky.degree(transactionNodeId(0)), 2);
assert.equal(tricky.degree(itemNodeId("txn#0")), 1);
assert.equal(tricky.degree(itemNodeId("A")), 2);

// Empty transactions add a transaction node with no edges and no items.
const sparse = IncidenceGraph.fromTransactions(toTransactionsV1([[], ["X"]]));
assert.deepStrictEqual(sparse.seedItems(), ["X"]);
assert.equal(sparse.degree(transactionNodeId(0)), 0);

console.log("[OK] incidence graph");
