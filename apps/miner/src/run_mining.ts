// Command-line miner: CSV file -> frequent itemsets + association rules.
//
// Usage:
//   npm run mine -- --file ./apps/miner/fixtures/shop_rows_001.csv --minSupport 0.4 --columns weather,drink

import fs from "node:fs";
import process from "node:process";

import { mergeMiningConfigV1 } from "@cooccur/contracts";
import type { MiningConfigOverridesV1 } from "@cooccur/contracts";
import { projectConfigToOptionsV1, runMiningV1 } from "@cooccur/mining-kernel";
import type { MiningRunV1 } from "@cooccur/mining-kernel";

import { loadMiningConfig, resolveRepoRoot } from "./config";
import { parseCsvTransactions } from "./csv_transactions";
import { loadEnv } from "./env";
import { renderLevelsTable, renderRulesTable } from "./render_tables";
import { parseNumberArg } from "./util";

export type MinerArgs = {
  file: string; // CSV path, header row required.
  profile?: string; // config/mining/<profile>.json
  columns?: string[]; // Columns to turn into items; all when absent.
  limit: number; // Rule rows printed.
  overrides: MiningConfigOverridesV1; // Flag values layered over the profile.
};

export function parseArgs(argv: ReadonlyArray<string>): MinerArgs {
  const get = (k: string): string | undefined => {
    const idx = argv.indexOf(`--${k}`);
    if (idx === -1) return undefined;
    const v = argv[idx + 1];
    if (!v || v.startsWith("--")) return undefined;
    return v;
  };

  const file = get("file");
  if (!file) throw new Error("missing --file <csv>");

  const columnsRaw = get("columns");
  const columns = columnsRaw
    ?.split(",")
    .map((c) => c.trim())
    .filter((c) => c.length > 0);

  const overrides: MiningConfigOverridesV1 = {};
  const minSupport = parseNumberArg(get("minSupport"));
  const minConfidence = parseNumberArg(get("minConfidence"));
  const maxK = parseNumberArg(get("maxK"));
  const shards = parseNumberArg(get("shards"));
  const maxCandidates = parseNumberArg(get("maxCandidates"));
  if (minSupport !== undefined) overrides.min_support = minSupport;
  if (minConfidence !== undefined) overrides.min_confidence = minConfidence;
  if (maxK !== undefined) overrides.max_k = maxK;
  if (shards !== undefined) overrides.shard_count = shards;
  if (maxCandidates !== undefined) overrides.max_candidates = maxCandidates;

  const limit = Math.max(1, Number.parseInt(get("limit") ?? "20", 10) || 20);

  return { file, profile: get("profile"), columns, limit, overrides };
}

export type MinerReport = {
  run: MiningRunV1;
  lines: string[];
};

/**
 * Loads config and CSV, runs the kernel and renders the report lines.
 */
export function executeMiningRun(args: MinerArgs, repoRoot: string = resolveRepoRoot()): MinerReport {
  const config = mergeMiningConfigV1(loadMiningConfig(args.profile, repoRoot), args.overrides);
  const transactions = parseCsvTransactions(fs.readFileSync(args.file, "utf8"), args.columns);
  const run = runMiningV1(transactions, projectConfigToOptionsV1(config));

  const lines = [
    `INFO: transactions=${run.transactionCount} min_support=${config.min_support} min_confidence=${config.min_confidence}`,
    renderLevelsTable(run.levels, run.transactionCount),
    renderRulesTable(run.rules, args.limit)
  ];
  if (run.skipped.length > 0) lines.push(`INFO: skipped ${run.skipped.length} unscoreable rules`);
  lines.push(`PASS: mined ${run.levels.length} levels, ${run.rules.length} rules`);
  return { run, lines };
}

function main(): void {
  loadEnv();
  const args = parseArgs(process.argv.slice(2));
  console.log(`INFO: mining file=${args.file} profile=${args.profile ?? process.env.COOCCUR_CONFIG_PROFILE ?? "default"}`);
  for (const line of executeMiningRun(args).lines) console.log(line);
}

if (require.main === module) {
  try {
    main();
  } catch (err: unknown) {
    console.error(`FAIL: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  }
}
