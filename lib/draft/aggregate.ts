// lib/draft/aggregate.ts
import type { NameResolver } from "./names";
import type { DraftPick, FlowEdgeCount } from "./types";

/** Unicode code-point order, locale-independent. Astral characters sort after the BMP. */
export function compareCodePoints(a: string, b: string): number {
  let i = 0;
  while (i < a.length && i < b.length) {
    const ca = a.codePointAt(i) ?? 0;
    const cb = b.codePointAt(i) ?? 0;
    if (ca !== cb) return ca < cb ? -1 : 1;
    i += ca > 0xffff ? 2 : 1;
  }
  return a.length === b.length ? 0 : a.length < b.length ? -1 : 1;
}

type Group = {
  college: string;
  nfl_team: string;
  entries: Array<{ pick: number; seq: number; player: string }>;
};

/**
 * Canonicalize every pick, group by (college, nfl_team), and emit one edge per pair.
 * Throws UnmappedNameError on the first name the lookups do not cover.
 */
export function aggregatePicks(picks: Iterable<DraftPick>, resolver: NameResolver): FlowEdgeCount[] {
  const groups = new Map<string, Group>();
  let seq = 0;

  for (const p of picks) {
    const college = resolver.resolveCollege(p.college, p.pick_number);
    const nfl_team = resolver.resolveTeam(p.nfl_team, p.pick_number);

    const key = JSON.stringify([college, nfl_team]);
    let g = groups.get(key);
    if (!g) {
      g = { college, nfl_team, entries: [] };
      groups.set(key, g);
    }
    g.entries.push({ pick: p.pick_number, seq: seq++, player: p.player_name });
  }

  const edges: FlowEdgeCount[] = [];
  for (const g of groups.values()) {
    const players = g.entries
      .slice()
      .sort((a, b) => a.pick - b.pick || a.seq - b.seq)
      .map((e) => e.player);
    edges.push(Object.freeze({
      college: g.college,
      nfl_team: g.nfl_team,
      count: players.length,
      players: Object.freeze(players),
    }));
  }

  edges.sort(
    (a, b) =>
      b.count - a.count ||
      compareCodePoints(a.college, b.college) ||
      compareCodePoints(a.nfl_team, b.nfl_team)
  );

  console.log(`[aggregate] ${seq} picks → ${edges.length} college/team pairs`);
  return edges;
}

export function totalPicks(edges: ReadonlyArray<FlowEdgeCount>): number {
  return edges.reduce((sum, e) => sum + e.count, 0);
}
