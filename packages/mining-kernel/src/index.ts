// @cooccur/mining-kernel
// Entry point exports for the itemset mining engine.

export * from "./kernel";
export * from "./errors/kernel_error";
export * from "./itemsets/itemset";
export * from "./graph/incidence_graph";
export * from "./inputs/thresholds";
export * from "./inputs/config_projector";
export * from "./levels/types";
export * from "./levels/candidate_generator";
export * from "./levels/support_counter";
export * from "./levels/level_miner";
export * from "./rules/rule_metrics";
export * from "./rules/rule_deriver";
export * from "./output/result_projection";
