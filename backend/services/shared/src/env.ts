// backend/services/shared/src/env.ts

/**
 * Deterministic environment loading for a service.
 * Files are tried in the service root, most specific first:
 *   .env.<NODE_ENV> → .env
 * Variables already present in process.env always win (injected env beats files),
 * and the first file to define a key wins over later ones.
 *
 * Notes:
 * - Only file loading + small readers live here. Defaults and validation belong
 *   to each service's config.ts.
 */

import fs from "node:fs";
import path from "node:path";
import { config as loadEnv } from "dotenv";
import { expand } from "dotenv-expand";

/** Load a single env file if it exists; expand; return true if loaded. */
function loadIfExists(absPath: string): boolean {
  if (!fs.existsSync(absPath)) return false;
  const parsed = loadEnv({ path: absPath, override: false });
  if (parsed.error) {
    throw new Error(
      `Failed to load env file: ${absPath}: ${String(parsed.error)}`
    );
  }
  expand(parsed);
  return true;
}

/** Returns the files that were actually loaded, in order. */
export function loadEnvForService(serviceRootAbs: string): string[] {
  const mode = (process.env.NODE_ENV || "").trim();
  const names = mode ? [`.env.${mode}`, ".env"] : [".env"];
  return names
    .map((n) => path.join(serviceRootAbs, n))
    .filter((f) => loadIfExists(f));
}

export type Env = Record<string, string | undefined>;

/** Trimmed value, or the fallback when unset/blank. */
export function envOr(env: Env, name: string, fallback: string): string {
  const v = env[name];
  return v == null || v.trim() === "" ? fallback : v.trim();
}

export function envNumber(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw == null || raw.trim() === "") return fallback;
  const n = Number(raw);
  if (!Number.isFinite(n)) {
    throw new Error(`Invalid number for env var ${name}: "${raw}"`);
  }
  return n;
}

export function envBoolean(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name];
  if (raw == null || raw.trim() === "") return fallback;
  const v = raw.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(v)) return true;
  if (["0", "false", "no", "off"].includes(v)) return false;
  throw new Error(`Invalid boolean for env var ${name}: "${raw}"`);
}
