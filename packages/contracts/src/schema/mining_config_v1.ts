import { z } from "zod"; // zod: runtime admission for config files and request bodies

const SemVerZ = z.string().regex(/^\d+\.\d+\.\d+$/); // schema_version must be SemVer, not free text

export const MiningConfigV1Z = z
  .object({
    schema_version: SemVerZ,
    min_support: z.number().finite().gt(0).lte(1), // (0, 1]; zero is rejected
    min_confidence: z.number().finite().min(0).max(1),
    max_k: z.number().int().min(1).nullable().optional(), // null or absent: no size bound
    shard_count: z.number().int().min(1).optional(),
    max_candidates: z.number().int().min(1).optional(), // per-level candidate ceiling; absent: none
    min_lift: z.number().finite().min(0).optional(), // floors apply only when present
    min_leverage: z.number().finite().min(-1).max(1).optional()
  })
  .strict(); // unknown keys are rejected

export const MiningConfigOverridesV1Z = MiningConfigV1Z.omit({ schema_version: true }).partial().strict();

export type MiningConfigV1 = z.infer<typeof MiningConfigV1Z>;
export type MiningConfigOverridesV1 = z.infer<typeof MiningConfigOverridesV1Z>;

export function parseMiningConfigV1(input: unknown): MiningConfigV1 {
  return MiningConfigV1Z.parse(input);
}

/**
 * Applies overrides on top of a base config and re-validates the result.
 * Keys whose override is undefined keep the base value.
 */
export function mergeMiningConfigV1(base: MiningConfigV1, overrides: MiningConfigOverridesV1 | undefined): MiningConfigV1 {
  if (!overrides) return base;
  const merged: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) merged[key] = value;
  }
  return MiningConfigV1Z.parse(merged);
}
