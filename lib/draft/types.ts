// lib/draft/types.ts
import { z } from "zod";

export const DraftPickSchema = z.object({
  pick_number: z.number().int().positive(),
  nfl_team: z.string().min(1),
  player_name: z.string().min(1),
  college: z.string().min(1),
});

/** One selection in a single draft year, as scraped (names not yet canonical). */
export type DraftPick = Readonly<z.infer<typeof DraftPickSchema>>;

export type FlowEdgeCount = Readonly<{
  college: string;
  nfl_team: string;
  count: number;
  players: ReadonlyArray<string>; // draft-pick order
}>;

export type NameKind = "college" | "team";

export type ConferenceMode = "all" | "bigten" | "sec" | "both";
