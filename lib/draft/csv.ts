// lib/draft/csv.ts
// Counts table ⇄ CSV. Header: college,nfl_team,count,players
import Papa from "papaparse";
import { z } from "zod";
import { ParseError } from "./errors";
import { writeFileAtomic } from "./fs";
import type { FlowEdgeCount } from "./types";

export const COUNTS_COLUMNS = ["college", "nfl_team", "count", "players"] as const;
export const PLAYER_DELIMITER = ";";

/* ───────────────────────── players field ───────────────────────── */

function escapePlayer(name: string): string {
  return name.replace(/\\/g, "\\\\").replace(/;/g, "\\;");
}

/** Join with ';', escaping a literal ';' as '\;' and '\' as '\\'. */
export function joinPlayers(players: ReadonlyArray<string>): string {
  return players.map(escapePlayer).join(PLAYER_DELIMITER);
}

export function splitPlayers(field: string): string[] {
  const out: string[] = [];
  let cur = "";
  for (let i = 0; i < field.length; i++) {
    const ch = field[i];
    if (ch === "\\" && i + 1 < field.length) {
      cur += field[i + 1];
      i += 1;
    } else if (ch === PLAYER_DELIMITER) {
      out.push(cur);
      cur = "";
    } else {
      cur += ch;
    }
  }
  out.push(cur);
  return out;
}

/* ───────────────────────── write ───────────────────────── */

export function formatCountsCsv(edges: ReadonlyArray<FlowEdgeCount>): string {
  const body = Papa.unparse(
    {
      fields: [...COUNTS_COLUMNS],
      data: edges.map((e) => [e.college, e.nfl_team, String(e.count), joinPlayers(e.players)]),
    },
    { newline: "\n", quotes: false }
  );
  // unparse already ends a header-only table with a newline
  return body.endsWith("\n") ? body : `${body}\n`;
}

export async function writeCountsCsv(target: string, edges: ReadonlyArray<FlowEdgeCount>): Promise<void> {
  await writeFileAtomic(target, formatCountsCsv(edges));
  console.log(`[aggregate] wrote ${edges.length} rows → ${target}`);
}

/* ───────────────────────── read ───────────────────────── */

const CountsRowSchema = z
  .object({
    college: z.string().min(1),
    nfl_team: z.string().min(1),
    count: z
      .string()
      .regex(/^\d+$/, "expected a whole number")
      .transform((s) => Number.parseInt(s, 10))
      .pipe(z.number().int().positive()),
    players: z.string().min(1),
  })
  .transform((r) => ({ ...r, players: splitPlayers(r.players) }))
  .refine((r) => r.players.length === r.count, { message: "player list length does not match count" });

export function parseCountsCsv(text: string): FlowEdgeCount[] {
  const res = Papa.parse<Record<string, string>>(text, { header: true, skipEmptyLines: true });

  if (res.errors.length > 0) {
    const first = res.errors[0];
    throw new ParseError(`counts CSV: ${first.message} (row ${first.row ?? "?"})`, {
      row: first.row,
    });
  }

  const fields = res.meta.fields ?? [];
  if (fields.join(",") !== COUNTS_COLUMNS.join(",")) {
    throw new ParseError(`counts CSV header must be ${COUNTS_COLUMNS.join(",")}`, {
      header: fields.join(","),
    });
  }

  return res.data.map((raw, i) => {
    const parsed = CountsRowSchema.safeParse(raw);
    if (!parsed.success) {
      const msg = parsed.error.issues.map((iss) => `${iss.path.join(".") || "row"}: ${iss.message}`).join("; ");
      throw new ParseError(`counts CSV row ${i + 1}: ${msg}`, { row: i + 1 });
    }
    const { college, nfl_team, count, players } = parsed.data;
    return Object.freeze({ college, nfl_team, count, players: Object.freeze(players) });
  });
}
