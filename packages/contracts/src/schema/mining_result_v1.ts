import { z } from "zod";

const ItemsZ = z.array(z.string().min(1)).min(1);

export const FrequentItemsetV1Z = z
  .object({
    items: ItemsZ,
    count: z.number().int().nonnegative(), // absolute support count
    support: z.number().min(0).max(1) // count / transaction_count
  })
  .strict();

export const FrequentLevelV1Z = z
  .object({
    k: z.number().int().min(1),
    itemsets: z.array(FrequentItemsetV1Z)
  })
  .strict();

export const AssociationRuleRecordV1Z = z
  .object({
    antecedent: ItemsZ,
    consequent: ItemsZ,
    support: z.number(),
    confidence: z.number().min(0).max(1),
    lift: z.number(),
    leverage: z.number(),
    conviction: z.number().nullable(), // null when confidence = 1 (unbounded)
    zhang: z.number(),
    jaccard: z.number(),
    certainty: z.number(),
    kulczynski: z.number()
  })
  .strict();

export const SkippedRuleRecordV1Z = z
  .object({
    antecedent: ItemsZ,
    consequent: ItemsZ,
    reason: z.enum(["UNDEFINED_METRIC", "MISSING_SUBSET_SUPPORT"])
  })
  .strict();

export const MiningResultV1Z = z
  .object({
    type: z.literal("mining_result_v1"),
    transaction_count: z.number().int().min(1),
    levels: z.array(FrequentLevelV1Z),
    rules: z.array(AssociationRuleRecordV1Z),
    skipped: z.array(SkippedRuleRecordV1Z)
  })
  .strict();

export type FrequentItemsetV1 = z.infer<typeof FrequentItemsetV1Z>;
export type FrequentLevelV1 = z.infer<typeof FrequentLevelV1Z>;
export type AssociationRuleRecordV1 = z.infer<typeof AssociationRuleRecordV1Z>;
export type SkippedRuleRecordV1 = z.infer<typeof SkippedRuleRecordV1Z>;
export type MiningResultV1 = z.infer<typeof MiningResultV1Z>;
