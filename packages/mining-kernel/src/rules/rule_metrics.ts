// Mining Kernel - rule metrics (v1)
//
// All inputs are relative supports in [0, 1]:
//   f = supp(A ∪ C), a = supp(A), c = supp(C)
//
// Singularities:
// - conviction with confidence = 1 is Infinity
// - certainty with c = 1 is 0
// - zhang with a zero denominator is 0 (leverage is 0 there as well)
// Callers must not pass a = 0 or c = 0.

export interface RuleMetricsV1 {
  support: number;
  confidence: number;
  lift: number;
  leverage: number;
  conviction: number;
  zhang: number;
  jaccard: number;
  certainty: number;
  kulczynski: number;
}

export function computeRuleMetricsV1(f: number, a: number, c: number): RuleMetricsV1 {
  const confidence = f / a;
  const lift = confidence / c;
  const leverage = f - a * c;

  const conviction = confidence >= 1 ? Number.POSITIVE_INFINITY : (1 - c) / (1 - confidence);

  const zhangDenominator = Math.max(f * (1 - a), a * (c - f));
  const zhang = zhangDenominator === 0 ? 0 : leverage / zhangDenominator;

  const jaccard = f / (a + c - f);
  const certainty = c >= 1 ? 0 : (confidence - c) / (1 - c);
  const kulczynski = 0.5 * (f / a + f / c);

  return { support: f, confidence, lift, leverage, conviction, zhang, jaccard, certainty, kulczynski };
}
