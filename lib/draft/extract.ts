// lib/draft/extract.ts
import * as cheerio from "cheerio";
import type { AnyNode } from "domhandler";
import type { DraftConfig } from "./config";
import { ParseError } from "./errors";
import { fetchDraftPage } from "./source";
import { DraftPickSchema, type DraftPick } from "./types";

/* ───────────────────────── Header matching ───────────────────────── */

type Column = "pick" | "team" | "player" | "college";

// Required in this relative order; other columns (Rnd., Pos., Conf., Notes) may sit between.
const COLUMN_ORDER: ReadonlyArray<Column> = ["pick", "team", "player", "college"];

const HEADER_ALIASES: Readonly<Record<Column, ReadonlySet<string>>> = {
  pick: new Set(["pick", "pick no", "overall", "overall pick", "selection"]),
  team: new Set(["nfl team", "team", "club"]),
  player: new Set(["player", "player name"]),
  college: new Set(["college", "college/university", "school", "university"]),
};

function headerKey(raw: string): string {
  return cleanText(raw)
    .toLowerCase()
    .replace(/[.#]/g, "")
    .replace(/\s+/g, " ")
    .trim();
}

type ColumnIndex = Record<Column, number>;

function matchHeader(row: ReadonlyArray<string>): ColumnIndex | null {
  const keys = row.map(headerKey);
  const found: Partial<ColumnIndex> = {};
  let from = 0;
  for (const col of COLUMN_ORDER) {
    const idx = keys.findIndex((k, i) => i >= from && HEADER_ALIASES[col].has(k));
    if (idx < 0) return null;
    found[col] = idx;
    from = idx + 1;
  }
  const { pick, team, player, college } = found;
  if (pick === undefined || team === undefined || player === undefined || college === undefined) return null;
  return { pick, team, player, college };
}

/* ───────────────────────── Cell cleaning ───────────────────────── */

/** Collapse whitespace (incl. nbsp) and drop bracketed footnotes like [a] or [12]. */
export function cleanText(s: string): string {
  return s
    .replace(/\u00a0/g, " ")
    .replace(/\s*\[[^\]]*\]/g, "")
    .replace(/\s+/g, " ")
    .trim();
}

/** "Dallas Cowboys (from Philadelphia)" → "Dallas Cowboys" */
export function cleanTeam(s: string): string {
  return cleanText(s).replace(/\s*\(.*\)/, "").trim();
}

/** Strip Pro Bowl / Hall of Fame style markers trailing a player's name. */
export function cleanPlayer(s: string): string {
  return cleanText(s).replace(/[\s†‡*^#¤§+]+$/u, "").trim();
}

export function cleanCollege(s: string): string {
  return cleanText(s);
}

function parsePickNumber(s: string): number | null {
  const t = cleanText(s);
  if (!/^\d+$/.test(t)) return null;
  const n = Number.parseInt(t, 10);
  return n > 0 ? n : null;
}

/* ───────────────────────── Table → grid ───────────────────────── */

/** Expand rowspan/colspan so every row has one entry per visual column. */
function tableGrid($: cheerio.CheerioAPI, table: cheerio.Cheerio<AnyNode>): string[][] {
  const rows = [
    ...table.children("thead, tbody, tfoot").children("tr").toArray(),
    ...table.children("tr").toArray(),
  ];

  const grid: string[][] = [];
  const carry: Array<{ text: string; rows: number } | undefined> = [];

  for (const tr of rows) {
    const row: string[] = [];
    let col = 0;

    const fillCarried = () => {
      for (let c = carry[col]; c && c.rows > 0; c = carry[col]) {
        row[col] = c.text;
        c.rows -= 1;
        col += 1;
      }
    };

    for (const cell of $(tr).children("th, td").toArray()) {
      fillCarried();

      const $cell = $(cell).clone();
      $cell.find('sup.reference, style, .sortkey, [style*="display:none"]').remove();
      const text = $cell.text();

      const rowspan = Math.max(1, Number.parseInt($(cell).attr("rowspan") ?? "1", 10) || 1);
      const colspan = Math.max(1, Number.parseInt($(cell).attr("colspan") ?? "1", 10) || 1);

      for (let k = 0; k < colspan; k++) {
        row[col] = text;
        carry[col] = rowspan > 1 ? { text, rows: rowspan - 1 } : undefined;
        col += 1;
      }
    }
    fillCarried();

    grid.push(Array.from(row, (v) => v ?? ""));
  }

  return grid;
}

/* ───────────────────────── Extractor ───────────────────────── */

type DraftTable = { grid: string[][]; headerRow: number; columns: ColumnIndex };

function findDraftTables(html: string): DraftTable[] {
  const $ = cheerio.load(html);
  const out: DraftTable[] = [];

  $("table").each((_i, el) => {
    const grid = tableGrid($, $(el));
    for (let r = 0; r < grid.length; r++) {
      const columns = matchHeader(grid[r]);
      if (columns) {
        out.push({ grid, headerRow: r, columns });
        return;
      }
    }
  });

  return out;
}

/**
 * Lazily yield the draft picks in source row order.
 * Rows whose pick cell is not a number (repeated headers, forfeited picks) are skipped.
 */
export function* extractPicks(html: string, year: number): Generator<DraftPick, void, undefined> {
  const tables = findDraftTables(html);
  if (tables.length === 0) {
    throw new ParseError(
      `no draft table with columns pick, team, player, college found for ${year}`,
      { year }
    );
  }

  const seen = new Set<number>();

  for (const { grid, headerRow, columns } of tables) {
    for (let r = headerRow + 1; r < grid.length; r++) {
      const row = grid[r];
      const pick = parsePickNumber(row[columns.pick] ?? "");
      if (pick === null) continue;

      if (seen.has(pick)) {
        throw new ParseError(`pick ${pick} appears more than once in the ${year} draft table`, {
          year,
          pick,
        });
      }
      seen.add(pick);

      const parsed = DraftPickSchema.safeParse({
        pick_number: pick,
        nfl_team: cleanTeam(row[columns.team] ?? ""),
        player_name: cleanPlayer(row[columns.player] ?? ""),
        college: cleanCollege(row[columns.college] ?? ""),
      });
      if (!parsed.success) {
        const msg = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
        throw new ParseError(`malformed row for pick ${pick} in the ${year} draft table (${msg})`, {
          year,
          pick,
        });
      }

      yield Object.freeze(parsed.data);
    }
  }
}

export type HtmlFetcher = (year: number) => Promise<string>;

export function liveFetcher(cfg: Pick<DraftConfig, "sourceBaseUrl" | "timeoutMs" | "userAgent">): HtmlFetcher {
  return (year) => fetchDraftPage(year, cfg);
}

/** Fetch + extract, materialized so the network call happens once. */
export async function scrapeDraftPicks(year: number, fetchHtml: HtmlFetcher): Promise<DraftPick[]> {
  const html = await fetchHtml(year);
  const picks = Array.from(extractPicks(html, year));
  console.log(`[extract] ${year}: ${picks.length} picks`);
  return picks;
}
