// lib/draft/colors.ts
import type { Lookups } from "./lookups";

export const DEFAULT_COLLEGE_COLOR = "#666666";
export const DEFAULT_TEAM_COLOR = "#B0B0B0";

export type ColorLookup = Readonly<{
  college(name: string): string;
  team(name: string): string;
}>;

export function createColorLookup(lookups: Lookups): ColorLookup {
  const colleges = new Map<string, string>();
  for (const e of lookups.colleges) if (e.color) colleges.set(e.name, e.color);
  const teams = new Map<string, string>();
  for (const e of lookups.teams) if (e.color) teams.set(e.name, e.color);

  return Object.freeze({
    college: (name: string) => colleges.get(name) ?? DEFAULT_COLLEGE_COLOR,
    team: (name: string) => teams.get(name) ?? DEFAULT_TEAM_COLOR,
  });
}

/** '#RRGGBB' → 'rgba(r,g,b,a)' for translucent links; anything else falls back to grey. */
export function hexToRgba(hex: string, alpha = 0.45): string {
  const s = hex.trim().replace(/^#/, "");
  if (!/^[0-9a-fA-F]{6}$/.test(s)) return `rgba(102,102,102,${alpha})`;
  const r = Number.parseInt(s.slice(0, 2), 16);
  const g = Number.parseInt(s.slice(2, 4), 16);
  const b = Number.parseInt(s.slice(4, 6), 16);
  return `rgba(${r},${g},${b},${alpha})`;
}
