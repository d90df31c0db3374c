import { z } from "zod";
import { MiningConfigOverridesV1Z } from "./mining_config_v1";

// Widest transaction a request may carry. The candidate policy enumerates
// every combination of the frequent items, so width is bounded at admission.
export const MAX_ITEMS_PER_TRANSACTION_V1 = 64;

export const TransactionV1Z = z.array(z.string().min(1)).max(MAX_ITEMS_PER_TRANSACTION_V1); // one transaction: its item labels

export const MiningRunRequestV1Z = z
  .object({
    transactions: z.array(TransactionV1Z).min(1), // N must be > 0
    config: MiningConfigOverridesV1Z.optional() // per-request overrides of the active profile
  })
  .strict();

export type MiningRunRequestV1 = z.infer<typeof MiningRunRequestV1Z>;
