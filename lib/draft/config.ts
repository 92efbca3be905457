// lib/draft/config.ts
// Environment-driven settings for the draft pipeline, read once at startup.

import path from "node:path";
import { fileURLToPath } from "node:url";

export type DraftConfig = Readonly<{
  sourceBaseUrl: string;
  timeoutMs: number;
  userAgent: string;
  lookupsDir: string;
  sankeyWidth: number;
  sankeyHeight: number;
}>;

const PROJECT_ROOT = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "..", "..");

function intFromEnv(raw: string | undefined, fallback: number): number {
  const n = Number.parseInt(raw ?? "", 10);
  return Number.isFinite(n) && n > 0 ? n : fallback;
}

export function loadDraftConfig(env: NodeJS.ProcessEnv = process.env): DraftConfig {
  return Object.freeze({
    sourceBaseUrl: (env.DRAFT_SOURCE_BASE_URL ?? "https://en.wikipedia.org/wiki").replace(/\/+$/, ""),
    timeoutMs: intFromEnv(env.DRAFT_HTTP_TIMEOUT_MS, 15_000),
    userAgent:
      env.DRAFT_USER_AGENT ?? "Mozilla/5.0 (compatible; CFB-NFL-Sankey/1.0)",
    lookupsDir: path.resolve(env.DRAFT_LOOKUPS_DIR ?? path.join(PROJECT_ROOT, "data", "lookups")),
    sankeyWidth: intFromEnv(env.DRAFT_SANKEY_WIDTH, 1200),
    sankeyHeight: intFromEnv(env.DRAFT_SANKEY_HEIGHT, 900),
  });
}
