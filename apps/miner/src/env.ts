import fs from "node:fs";
import path from "node:path";

import { findRepoRoot } from "./util";

export function loadDotEnvFile(fp: string): void {
  if (!fs.existsSync(fp)) return;
  const raw = fs.readFileSync(fp, "utf8");
  for (const line of raw.split(/\r?\n/)) {
    const s = line.trim();
    if (!s || s.startsWith("#")) continue;
    const m = s.match(/^([A-Za-z_][A-Za-z0-9_]*)=(.*)$/);
    if (!m) continue;
    const key = m[1];
    let val = m[2] ?? "";
    // Strip surrounding quotes if present
    if ((val.startsWith('"') && val.endsWith('"')) || (val.startsWith("'") && val.endsWith("'"))) {
      val = val.slice(1, -1);
    }
    // Do not overwrite explicitly provided env vars
    if (process.env[key] == null) process.env[key] = val;
  }
}

/**
 * Loads `.env` from the repo root into process.env. Missing files are ignored.
 */
export function loadEnv(startDir: string = process.cwd()): void {
  let repoRoot: string;
  try {
    repoRoot = process.env.COOCCUR_REPO_ROOT
      ? path.resolve(process.env.COOCCUR_REPO_ROOT)
      : findRepoRoot(startDir, "config/mining/default.json");
  } catch {
    // No repo root above startDir: nothing to load.
    return;
  }
  loadDotEnvFile(path.join(repoRoot, ".env"));
}

