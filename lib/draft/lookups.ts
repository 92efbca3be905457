// lib/draft/lookups.ts
// Static college / NFL team tables: canonical names, variants, colors, conferences.
import { readFileSync } from "node:fs";
import path from "node:path";
import { z } from "zod";
import { ParseError } from "./errors";

const HexColor = z.string().regex(/^#[0-9a-fA-F]{6}$/, "expected #RRGGBB");

const EntrySchema = z.object({
  name: z.string().trim().min(1),
  aliases: z.array(z.string().trim().min(1)).default([]),
  color: HexColor.optional(),
  conference: z.string().trim().min(1).optional(),
});

const EntryListSchema = z.array(EntrySchema);

export type LookupEntry = Readonly<{
  name: string;
  aliases: ReadonlyArray<string>;
  color?: string;
  conference?: string;
}>;

export type Lookups = Readonly<{
  colleges: ReadonlyArray<LookupEntry>;
  teams: ReadonlyArray<LookupEntry>;
}>;

export const COLLEGES_FILE = "colleges.json";
export const TEAMS_FILE = "nfl-teams.json";

function freezeEntries(entries: z.infer<typeof EntryListSchema>): ReadonlyArray<LookupEntry> {
  return Object.freeze(
    entries.map((e) => Object.freeze({ ...e, aliases: Object.freeze([...e.aliases]) }))
  );
}

export function parseLookupEntries(raw: unknown, source: string): ReadonlyArray<LookupEntry> {
  const parsed = EntryListSchema.safeParse(raw);
  if (!parsed.success) {
    const msg = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new ParseError(`invalid lookup table ${source}: ${msg}`, { file: source });
  }
  return freezeEntries(parsed.data);
}

function readEntries(file: string): ReadonlyArray<LookupEntry> {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(file, "utf8"));
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new ParseError(`could not read lookup table ${file}: ${detail}`, { file });
  }
  return parseLookupEntries(raw, file);
}

/** Load both tables once; callers pass the result down instead of reaching for globals. */
export function loadLookups(dir: string): Lookups {
  return Object.freeze({
    colleges: readEntries(path.join(dir, COLLEGES_FILE)),
    teams: readEntries(path.join(dir, TEAMS_FILE)),
  });
}
