// Mining Kernel - error codes (v1)
//
// Abort codes stop a run. Threshold and size codes fire before any
// transaction scan; CANDIDATE_LIMIT_EXCEEDED fires before the level that
// would exceed the limit is generated.
// Skip codes never escape the kernel: the rule deriver records them per rule.

/**
 * Codes that abort a mining run.
 */
export type MiningAbortCodeV1 =
  | "INVALID_THRESHOLD"
  | "EMPTY_TRANSACTION_SET"
  | "INVALID_LEVEL_SIZE"
  | "CANDIDATE_LIMIT_EXCEEDED";

/**
 * Codes attached to rules the deriver could not score.
 */
export type RuleSkipReasonV1 = "UNDEFINED_METRIC" | "MISSING_SUBSET_SUPPORT";

export class MiningKernelError extends Error {
  public readonly code: MiningAbortCodeV1;
  public readonly context: string;

  constructor(code: MiningAbortCodeV1, detail: string, context: string) {
    super(`${code}: ${detail} @ ${context}`);
    this.name = "MiningKernelError";
    this.code = code;
    this.context = context;
  }
}

export function isMiningKernelError(err: unknown): err is MiningKernelError {
  return err instanceof MiningKernelError;
}
