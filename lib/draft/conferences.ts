// lib/draft/conferences.ts
import type { Lookups } from "./lookups";
import type { NameResolver } from "./names";
import type { ConferenceMode, DraftPick } from "./types";

export const CONFERENCE_MODES: ReadonlyArray<ConferenceMode> = ["all", "bigten", "sec", "both"];

const MODE_CONFERENCES: Readonly<Record<Exclude<ConferenceMode, "all">, ReadonlyArray<string>>> = {
  bigten: ["Big Ten"],
  sec: ["SEC"],
  both: ["Big Ten", "SEC"],
};

export function conferenceScopeLabel(mode: ConferenceMode): string {
  switch (mode) {
    case "bigten":
      return "Big Ten";
    case "sec":
      return "SEC";
    case "both":
      return "Big Ten & SEC";
    case "all":
    default:
      return "College Football";
  }
}

/** Canonical college names in the requested conferences; null means "no filter". */
export function allowedColleges(mode: ConferenceMode, lookups: Lookups): ReadonlySet<string> | null {
  if (mode === "all") return null;
  const confs = new Set(MODE_CONFERENCES[mode]);
  return new Set(
    lookups.colleges.filter((c) => c.conference !== undefined && confs.has(c.conference)).map((c) => c.name)
  );
}

/**
 * Keep only picks from colleges in the selected conferences.
 * A college the lookups do not know cannot be in any conference, so it is filtered, not failed.
 */
export function filterByConference(
  picks: ReadonlyArray<DraftPick>,
  mode: ConferenceMode,
  resolver: NameResolver,
  lookups: Lookups
): DraftPick[] {
  const allow = allowedColleges(mode, lookups);
  if (!allow) return [...picks];

  const kept = picks.filter((p) => {
    const canonical = resolver.tryResolveCollege(p.college);
    return canonical !== undefined && allow.has(canonical);
  });
  console.log(`[filter] ${mode}: kept ${kept.length} of ${picks.length} picks`);
  return kept;
}
