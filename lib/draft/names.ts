// lib/draft/names.ts
import { ParseError, UnmappedNameError } from "./errors";
import type { LookupEntry, Lookups } from "./lookups";
import type { NameKind } from "./types";

/** Case-, whitespace- and dash-insensitive key for variant matching. */
export function nameKey(raw: string): string {
  return raw
    .normalize("NFC")
    .replace(/[‐-―]/g, "-")
    .replace(/\s+/g, " ")
    .trim()
    .toLowerCase();
}

function buildIndex(entries: ReadonlyArray<LookupEntry>, kind: NameKind): ReadonlyMap<string, string> {
  const index = new Map<string, string>();
  for (const e of entries) {
    for (const variant of [e.name, ...e.aliases]) {
      const key = nameKey(variant);
      const prev = index.get(key);
      if (prev !== undefined && prev !== e.name) {
        throw new ParseError(
          `${kind} variant "${variant}" maps to both "${prev}" and "${e.name}"`,
          { kind, variant }
        );
      }
      index.set(key, e.name);
    }
  }
  return index;
}

export type NameResolver = Readonly<{
  resolveCollege(raw: string, pickNumber?: number): string;
  resolveTeam(raw: string, pickNumber?: number): string;
  tryResolveCollege(raw: string): string | undefined;
  tryResolveTeam(raw: string): string | undefined;
}>;

export function createNameResolver(lookups: Lookups): NameResolver {
  const colleges = buildIndex(lookups.colleges, "college");
  const teams = buildIndex(lookups.teams, "team");

  const strict = (index: ReadonlyMap<string, string>, kind: NameKind) =>
    (raw: string, pickNumber?: number): string => {
      const hit = index.get(nameKey(raw));
      if (hit === undefined) throw new UnmappedNameError(raw, kind, pickNumber);
      return hit;
    };

  return Object.freeze({
    resolveCollege: strict(colleges, "college"),
    resolveTeam: strict(teams, "team"),
    tryResolveCollege: (raw: string) => colleges.get(nameKey(raw)),
    tryResolveTeam: (raw: string) => teams.get(nameKey(raw)),
  });
}
