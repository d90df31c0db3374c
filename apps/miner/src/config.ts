// Mining config SSOT loader.
//
// Contract:
// - SSOT files: config/mining/<profile>.json, validated with MiningConfigV1Z
// - repo root: COOCCUR_REPO_ROOT, else the first ancestor of cwd holding
//   config/mining/default.json
// - profile: explicit argument, else COOCCUR_CONFIG_PROFILE, else "default"

import fs from "node:fs";
import path from "node:path";

import { parseMiningConfigV1 } from "@cooccur/contracts";
import type { MiningConfigV1 } from "@cooccur/contracts";

import { assertString, findRepoRoot } from "./util";

const PROFILE_NAME = /^[A-Za-z0-9_-]+$/;

export function resolveRepoRoot(startDir: string = process.cwd()): string {
  if (process.env.COOCCUR_REPO_ROOT) return path.resolve(process.env.COOCCUR_REPO_ROOT);
  return findRepoRoot(startDir, "config/mining/default.json");
}

export function resolveProfile(profile?: string): string {
  const name = assertString(profile ?? process.env.COOCCUR_CONFIG_PROFILE ?? "default", "config_profile");
  // Profiles name a file under config/mining; no path segments.
  if (!PROFILE_NAME.test(name)) throw new Error(`invalid config_profile: ${name}`);
  return name;
}

export function loadMiningConfig(profile?: string, repoRoot: string = resolveRepoRoot()): MiningConfigV1 {
  const name = resolveProfile(profile);
  const p = path.join(repoRoot, "config", "mining", `${name}.json`);
  const raw = fs.readFileSync(p, "utf8");
  return parseMiningConfigV1(JSON.parse(raw));
}
