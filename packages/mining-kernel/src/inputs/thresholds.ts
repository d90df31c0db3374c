// Mining Kernel - threshold and transaction guards (v1)
//
// Every public entrypoint runs these before touching the transactions:
// - min_support is a fraction in (0, 1]
// - min_confidence is a fraction in [0, 1]
// - size bounds (max_k, shard_count, max_candidates) are positive integers
// - the transaction count N is > 0, since all supports divide by it

import { MiningKernelError } from "../errors/kernel_error";

/**
 * Throws INVALID_THRESHOLD unless `value` is a finite fraction in (0, 1].
 */
export function assertMinSupportV1(value: number, context: string): void {
  if (!Number.isFinite(value) || value <= 0 || value > 1) {
    throw new MiningKernelError("INVALID_THRESHOLD", `min_support must be in (0, 1], got ${value}`, context);
  }
}

/**
 * Throws INVALID_THRESHOLD unless `value` is a finite fraction in [0, 1].
 */
export function assertMinConfidenceV1(value: number, context: string): void {
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new MiningKernelError("INVALID_THRESHOLD", `min_confidence must be in [0, 1], got ${value}`, context);
  }
}

export function assertPositiveIntV1(value: number, name: string, context: string): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new MiningKernelError("INVALID_THRESHOLD", `${name} must be a positive integer, got ${value}`, context);
  }
}

export function assertFiniteV1(value: number, name: string, context: string): void {
  if (!Number.isFinite(value)) {
    throw new MiningKernelError("INVALID_THRESHOLD", `${name} must be finite, got ${value}`, context);
  }
}

export function assertNonEmptyTransactionsV1(count: number, context: string): void {
  if (count <= 0) {
    throw new MiningKernelError("EMPTY_TRANSACTION_SET", "at least one transaction is required", context);
  }
}
