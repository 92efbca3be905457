// lib/draft/cli.ts
import { z } from "zod";
import { loadDraftConfig, type DraftConfig } from "./config";
import { isDraftPipelineError } from "./errors";
import type { HtmlFetcher } from "./extract";
import { loadLookups, type Lookups } from "./lookups";
import { runPipeline } from "./pipeline";

export const USAGE =
  "usage: build-draft-sankey --year <int> --out_dir <path> [--confs all|bigten|sec|both]";

export const EXIT_OK = 0;
export const EXIT_PIPELINE_ERROR = 1;
export const EXIT_USAGE = 2;

const CliArgsSchema = z.object({
  year: z.coerce.number().int().min(1936).max(2100),
  out_dir: z.string().trim().min(1),
  confs: z.enum(["all", "bigten", "sec", "both"]).default("all"),
});

export type CliArgs = z.infer<typeof CliArgsSchema>;

export type ParsedArgs =
  | { ok: true; args: CliArgs }
  | { ok: false; message: string };

/** Accepts both `--year 2025` and `--year=2025`. */
export function parseCliArgs(argv: ReadonlyArray<string>): ParsedArgs {
  const raw = new Map<string, string>();
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (!a.startsWith("--")) return { ok: false, message: `unexpected argument "${a}"` };
    const eq = a.indexOf("=");
    if (eq >= 0) {
      raw.set(a.slice(2, eq), a.slice(eq + 1));
      continue;
    }
    const next = argv[i + 1];
    if (next === undefined || next.startsWith("--")) {
      return { ok: false, message: `missing value for ${a}` };
    }
    raw.set(a.slice(2), next);
    i += 1;
  }

  const known = new Set(Object.keys(CliArgsSchema.shape));
  for (const k of raw.keys()) {
    if (!known.has(k)) return { ok: false, message: `unknown option --${k}` };
  }

  const parsed = CliArgsSchema.safeParse(Object.fromEntries(raw));
  if (!parsed.success) {
    const msg = parsed.error.issues.map((i) => `--${i.path.join(".")}: ${i.message}`).join("; ");
    return { ok: false, message: msg };
  }
  return { ok: true, args: parsed.data };
}

export type CliDeps = {
  config?: DraftConfig;
  lookups?: Lookups;
  fetchHtml?: HtmlFetcher;
};

/** Returns the process exit code; never calls process.exit itself. */
export async function main(argv: ReadonlyArray<string>, deps: CliDeps = {}): Promise<number> {
  const parsed = parseCliArgs(argv);
  if (!parsed.ok) {
    console.error(`UsageError: ${parsed.message}\n${USAGE}`);
    return EXIT_USAGE;
  }
  const { year, out_dir, confs } = parsed.args;

  try {
    const config = deps.config ?? loadDraftConfig();
    const lookups = deps.lookups ?? loadLookups(config.lookupsDir);
    const result = await runPipeline({
      year,
      outDir: out_dir,
      conferences: confs,
      config,
      lookups,
      fetchHtml: deps.fetchHtml,
    });
    console.log(`[cli] ${result.csvPath}`);
    console.log(`[cli] ${result.htmlPath}`);
    return EXIT_OK;
  } catch (err) {
    if (isDraftPipelineError(err)) {
      console.error(`${err.kind}: ${err.message}`);
      return EXIT_PIPELINE_ERROR;
    }
    throw err;
  }
}
