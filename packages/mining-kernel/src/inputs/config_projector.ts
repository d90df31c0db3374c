// Mining Kernel - config projection (v1)
//
// Maps the snake_case wire config onto the kernel's option objects.
// Only the fields listed here reach the kernel.

import type { MiningConfigV1 } from "@cooccur/contracts";
import type { MineOptionsV1 } from "../levels/level_miner";
import type { DeriveRulesOptionsV1 } from "../rules/rule_deriver";

export type MiningRunOptionsV1 = MineOptionsV1 & DeriveRulesOptionsV1;

export function projectConfigToOptionsV1(config: MiningConfigV1): MiningRunOptionsV1 {
  const options: MiningRunOptionsV1 = {
    minSupport: config.min_support,
    minConfidence: config.min_confidence
  };
  if (config.max_k != null) options.maxK = config.max_k;
  if (config.shard_count !== undefined) options.shardCount = config.shard_count;
  if (config.max_candidates !== undefined) options.maxCandidates = config.max_candidates;
  if (config.min_lift !== undefined) options.minLift = config.min_lift;
  if (config.min_leverage !== undefined) options.minLeverage = config.min_leverage;
  return options;
}
