// lib/draft/__tests__/helpers.ts
import { readFileSync } from "node:fs";
import { mkdtemp } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { parseLookupEntries, type Lookups } from "@/lib/draft/lookups";
import type { DraftPick } from "@/lib/draft/types";

const here = path.dirname(fileURLToPath(import.meta.url));

export function fixture(name: string): string {
  return readFileSync(path.join(here, "fixtures", name), "utf8");
}

export function tempDir(prefix = "draft-test-"): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), prefix));
}

export function pick(pick_number: number, nfl_team: string, player_name: string, college: string): DraftPick {
  return { pick_number, nfl_team, player_name, college };
}

/** Small lookup set; "NY Giants" is canonical here on purpose. */
export function testLookups(): Lookups {
  return {
    colleges: parseLookupEntries(
      [
        { name: "Ohio State", aliases: ["Ohio St."], color: "#BB0000", conference: "Big Ten" },
        { name: "Alabama", conference: "SEC" },
        { name: "Texas A&M", color: "#500000", conference: "SEC" },
        { name: "Notre Dame" },
      ],
      "test-colleges"
    ),
    teams: parseLookupEntries(
      [
        { name: "Dallas Cowboys", color: "#041E42", aliases: ["DAL"] },
        { name: "NY Giants", aliases: ["New York Giants"] },
      ],
      "test-teams"
    ),
  };
}

type DraftRow = [pick: string, team: string, player: string, college: string];

/** A bare table in the draft layout, for ad-hoc rows. */
export function draftTable(rows: DraftRow[]): string {
  const body = rows
    .map(([p, t, pl, c]) => `<tr><td>${p}</td><td>${t}</td><td>${pl}</td><td>QB</td><td>${c}</td></tr>`)
    .join("\n");
  return `<table><tr><th>Pick</th><th>Team</th><th>Player</th><th>Pos.</th><th>College</th></tr>${body}</table>`;
}

/** One-table page in the draft layout. */
export function draftTableHtml(rows: DraftRow[]): string {
  return `<html><body>${draftTable(rows)}</body></html>`;
}
