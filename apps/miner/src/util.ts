import fs from "node:fs";
import path from "node:path";

/**
 * Find repo root by walking upward from `startDir` until `requiredRelativePath` exists.
 *
 * Contract:
 * - Returns an absolute directory path.
 * - Throws if the root cannot be found within `maxHops`.
 */
export function findRepoRoot(startDir: string, requiredRelativePath: string, maxHops = 8): string {
  let cur = path.resolve(startDir);

  for (let hop = 0; hop <= maxHops; hop++) {
    const probe = path.join(cur, requiredRelativePath);
    if (fs.existsSync(probe)) return cur;

    const parent = path.dirname(cur);
    if (parent === cur) break; // reached filesystem root
    cur = parent;
  }

  throw new Error(`Cannot locate repo root from ${startDir}; missing ${requiredRelativePath}`);
}

export function assertString(v: unknown, name: string): string {
  if (typeof v !== "string" || v.trim().length === 0) throw new Error(`invalid ${name}`);
  return v.trim();
}

/**
 * Parses a numeric CLI value. Returns NaN for unparsable input so that schema
 * validation reports it with the offending key.
 */
export function parseNumberArg(v: string | undefined): number | undefined {
  if (v === undefined) return undefined;
  const s = v.trim();
  return s.length === 0 ? Number.NaN : Number(s);
}
