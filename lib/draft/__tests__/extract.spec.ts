import { afterEach, describe, expect, it, vi } from "vitest";
import { FetchError, ParseError } from "@/lib/draft/errors";
import { cleanPlayer, cleanTeam, extractPicks, scrapeDraftPicks } from "@/lib/draft/extract";
import { draftPageUrl, fetchDraftPage } from "@/lib/draft/source";
import { draftTable, draftTableHtml, fixture } from "./helpers";

const cfg = { sourceBaseUrl: "https://wiki.example.test/wiki", timeoutMs: 1000, userAgent: "test-agent" };

describe("extractPicks", () => {
  it("reads the draft table in source order, expanding rowspans and cleaning cells", () => {
    const picks = Array.from(extractPicks(fixture("draft-page.html"), 2025));

    expect(picks).toEqual([
      { pick_number: 1, nfl_team: "Dallas Cowboys", player_name: "Alan Smith", college: "Ohio State" },
      { pick_number: 2, nfl_team: "Dallas Cowboys", player_name: "Ben Jones", college: "Ohio State" },
      { pick_number: 3, nfl_team: "New York Giants", player_name: "Carl Lee", college: "Alabama" },
      { pick_number: 4, nfl_team: "Las Vegas Raiders", player_name: "Dan O'Neil", college: "Texas A&M" },
      { pick_number: 5, nfl_team: "Buffalo Bills", player_name: "Eli Park", college: "Notre Dame" },
    ]);
  });

  it("is lazy: the first record is available before the rest are parsed", () => {
    const gen = extractPicks(fixture("draft-page.html"), 2025);
    const first = gen.next();
    expect(first.done).toBe(false);
    expect(first.value).toMatchObject({ pick_number: 1, player_name: "Alan Smith" });
  });

  it("fails with ParseError when no table has the pick/team/player/college shape", () => {
    const html = "<table><tr><th>Player</th><th>College</th><th>Team</th><th>Pick</th></tr></table>";
    expect(() => Array.from(extractPicks(html, 1999))).toThrow(ParseError);
    expect(() => Array.from(extractPicks(html, 1999))).toThrow(
      "no draft table with columns pick, team, player, college found for 1999"
    );
  });

  it("skips rows whose pick cell is not a number", () => {
    const html = draftTableHtml([
      ["1", "Dallas Cowboys", "A. Smith", "Ohio State"],
      ["Forfeited", "New York Giants", "—", "—"],
      ["2", "New York Giants", "B. Jones", "Alabama"],
    ]);
    expect(Array.from(extractPicks(html, 2025)).map((p) => p.pick_number)).toEqual([1, 2]);
  });

  it("rejects a repeated pick number", () => {
    const html = draftTableHtml([
      ["7", "Dallas Cowboys", "A. Smith", "Ohio State"],
      ["7", "New York Giants", "B. Jones", "Alabama"],
    ]);
    expect(() => Array.from(extractPicks(html, 2025))).toThrow("pick 7 appears more than once in the 2025 draft table");
  });

  it("reads several matching tables in document order", () => {
    const html =
      "<html><body><h2>Round 1</h2>" +
      draftTable([
        ["1", "Dallas Cowboys", "A. Smith", "Ohio State"],
        ["2", "New York Giants", "B. Jones", "Alabama"],
      ]) +
      "<h2>Round 2</h2>" +
      draftTable([["33", "Buffalo Bills", "C. Lee", "Notre Dame"]]) +
      "</body></html>";
    expect(Array.from(extractPicks(html, 2025)).map((p) => [p.pick_number, p.player_name])).toEqual([
      [1, "A. Smith"],
      [2, "B. Jones"],
      [33, "C. Lee"],
    ]);
  });

  it("rejects a pick number repeated across tables", () => {
    const html =
      "<html><body>" +
      draftTable([["12", "Dallas Cowboys", "A. Smith", "Ohio State"]]) +
      draftTable([["12", "New York Giants", "B. Jones", "Alabama"]]) +
      "</body></html>";
    const gen = extractPicks(html, 2025);
    expect(gen.next().value).toMatchObject({ pick_number: 12, player_name: "A. Smith" });
    expect(() => gen.next()).toThrow(ParseError);
    expect(() => Array.from(extractPicks(html, 2025))).toThrow(
      "pick 12 appears more than once in the 2025 draft table"
    );
  });

  it("rejects a row with an empty college cell", () => {
    const html = draftTableHtml([["1", "Dallas Cowboys", "A. Smith", " "]]);
    expect(() => Array.from(extractPicks(html, 2025))).toThrow(ParseError);
  });
});

describe("cell cleaning", () => {
  it("drops parenthetical trade notes from teams", () => {
    expect(cleanTeam("Dallas Cowboys (from Philadelphia) [c]")).toBe("Dallas Cowboys");
  });

  it("drops trailing honor markers from players", () => {
    expect(cleanPlayer("Jane Doe ‡")).toBe("Jane Doe");
    expect(cleanPlayer("John Roe^")).toBe("John Roe");
  });
});

describe("fetchDraftPage", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("builds the year page URL", () => {
    expect(draftPageUrl(2025, cfg.sourceBaseUrl)).toBe("https://wiki.example.test/wiki/2025_NFL_Draft");
  });

  it("returns the body and sends the configured user agent", async () => {
    const fetchMock = vi.fn(async () => new Response("<html></html>", { status: 200 }));
    vi.stubGlobal("fetch", fetchMock);

    await expect(fetchDraftPage(2025, cfg)).resolves.toBe("<html></html>");
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(fetchMock).toHaveBeenCalledWith(
      "https://wiki.example.test/wiki/2025_NFL_Draft",
      expect.objectContaining({ headers: expect.objectContaining({ "user-agent": "test-agent" }) })
    );
  });

  it("maps a non-2xx status to FetchError without retrying", async () => {
    const fetchMock = vi.fn(async () => new Response("missing", { status: 404 }));
    vi.stubGlobal("fetch", fetchMock);

    const err = await fetchDraftPage(1900, cfg).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(FetchError);
    expect(err).toMatchObject({ kind: "FetchError", year: 1900, status: 404 });
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("maps a network failure to FetchError", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => {
      throw new TypeError("fetch failed");
    }));

    await expect(fetchDraftPage(2025, cfg)).rejects.toThrow(
      "could not fetch 2025 draft page https://wiki.example.test/wiki/2025_NFL_Draft: fetch failed"
    );
  });
});

describe("scrapeDraftPicks", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("extracts from whatever the fetcher returns", async () => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    const picks = await scrapeDraftPicks(2025, async () => fixture("draft-page.html"));
    expect(picks).toHaveLength(5);
  });
});
