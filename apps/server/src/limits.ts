// Service-side ceilings on mining work.
//
// A request may tighten max_k and max_candidates below these values but never
// lift them; a profile or request with max_k null still runs under maxK.

import { z } from "zod";

import type { MiningConfigV1 } from "@cooccur/contracts";

export type ServiceLimitsV1 = {
  maxK: number;
  maxCandidates: number;
};

export const DEFAULT_SERVICE_LIMITS: ServiceLimitsV1 = Object.freeze({
  maxK: 4,
  maxCandidates: 10_000
});

const ServiceLimitsEnvZ = z.object({
  COOCCUR_SERVICE_MAX_K: z.coerce.number().int().min(1).optional(),
  COOCCUR_SERVICE_MAX_CANDIDATES: z.coerce.number().int().min(1).optional()
});

/**
 * Reads COOCCUR_SERVICE_MAX_K and COOCCUR_SERVICE_MAX_CANDIDATES; unset keys
 * fall back to DEFAULT_SERVICE_LIMITS. Invalid values throw.
 */
export function loadServiceLimits(env: NodeJS.ProcessEnv = process.env): ServiceLimitsV1 {
  const parsed = ServiceLimitsEnvZ.parse({
    COOCCUR_SERVICE_MAX_K: env.COOCCUR_SERVICE_MAX_K || undefined,
    COOCCUR_SERVICE_MAX_CANDIDATES: env.COOCCUR_SERVICE_MAX_CANDIDATES || undefined
  });
  return {
    maxK: parsed.COOCCUR_SERVICE_MAX_K ?? DEFAULT_SERVICE_LIMITS.maxK,
    maxCandidates: parsed.COOCCUR_SERVICE_MAX_CANDIDATES ?? DEFAULT_SERVICE_LIMITS.maxCandidates
  };
}

export function applyServiceLimits(config: MiningConfigV1, limits: ServiceLimitsV1): MiningConfigV1 {
  return {
    ...config,
    max_k: Math.min(config.max_k ?? limits.maxK, limits.maxK),
    max_candidates: Math.min(config.max_candidates ?? limits.maxCandidates, limits.maxCandidates)
  };
}
