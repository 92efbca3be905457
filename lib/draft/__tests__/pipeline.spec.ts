import { readdir, readFile } from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { loadDraftConfig } from "@/lib/draft/config";
import { parseCountsCsv } from "@/lib/draft/csv";
import { RenderError, UnmappedNameError } from "@/lib/draft/errors";
import { loadLookups } from "@/lib/draft/lookups";
import { chartTitle, countsCsvPath, runPipeline, sankeyHtmlPath } from "@/lib/draft/pipeline";
import { draftTableHtml, fixture, tempDir } from "./helpers";

const config = loadDraftConfig({ DRAFT_SANKEY_WIDTH: "900", DRAFT_SANKEY_HEIGHT: "500" });
const lookups = loadLookups(config.lookupsDir);
const fromFixture = async () => fixture("draft-page.html");

describe("runPipeline", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
  });
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("produces exactly one counts CSV and one HTML file", async () => {
    const outDir = await tempDir();
    const result = await runPipeline({ year: 2025, outDir, config, lookups, fetchHtml: fromFixture });

    expect(result.csvPath).toBe(path.join(outDir, "cfb_nfl_counts_2025.csv"));
    expect(result.htmlPath).toBe(path.join(outDir, "cfb_sankey_2025.html"));
    expect((await readdir(outDir)).sort()).toEqual(["cfb_nfl_counts_2025.csv", "cfb_sankey_2025.html"]);

    const csv = await readFile(result.csvPath, "utf8");
    expect(csv).toBe(
      [
        "college,nfl_team,count,players",
        "Ohio State,Dallas Cowboys,2,Alan Smith;Ben Jones",
        "Alabama,New York Giants,1,Carl Lee",
        "Notre Dame,Buffalo Bills,1,Eli Park",
        "Texas A&M,Las Vegas Raiders,1,Dan O'Neil",
        "",
      ].join("\n")
    );
    expect(parseCountsCsv(csv)).toEqual(result.edges);
    expect(result.edges.reduce((n, e) => n + e.count, 0)).toBe(result.picks.length);

    const html = await readFile(result.htmlPath, "utf8");
    expect(html).toContain("<title>From Saturdays to Sundays: College Football in the 2025 NFL Draft</title>");
    expect(html).toContain('viewBox="0 0 900 500"');
  });

  it("filters to the requested conferences before aggregating", async () => {
    const outDir = await tempDir();
    const result = await runPipeline({
      year: 2025,
      outDir,
      conferences: "sec",
      config,
      lookups,
      fetchHtml: fromFixture,
    });

    expect(result.edges.map((e) => `${e.college} → ${e.nfl_team}`)).toEqual([
      "Alabama → New York Giants",
      "Texas A&M → Las Vegas Raiders",
    ]);
    expect(await readFile(result.htmlPath, "utf8")).toContain(chartTitle(2025, "sec"));
  });

  it("stops on an unmapped name and writes nothing", async () => {
    const outDir = await tempDir();
    const html = draftTableHtml([
      ["1", "Dallas Cowboys", "A. Smith", "Ohio State"],
      ["2", "New York Giants", "B. Jones", "Hogwarts"],
    ]);

    await expect(
      runPipeline({ year: 2025, outDir, config, lookups, fetchHtml: async () => html })
    ).rejects.toThrow(UnmappedNameError);
    expect(await readdir(outDir)).toEqual([]);
  });

  it("keeps the counts CSV when rendering has nothing to draw", async () => {
    const outDir = await tempDir();
    const html = draftTableHtml([["1", "Dallas Cowboys", "A. Smith", "Alabama"]]);

    await expect(
      runPipeline({ year: 2024, outDir, conferences: "bigten", config, lookups, fetchHtml: async () => html })
    ).rejects.toThrow(RenderError);

    expect(await readdir(outDir)).toEqual(["cfb_nfl_counts_2024.csv"]);
    expect(await readFile(countsCsvPath(outDir, 2024), "utf8")).toBe("college,nfl_team,count,players\n");
    expect(sankeyHtmlPath(outDir, 2024)).toBe(path.join(outDir, "cfb_sankey_2024.html"));
  });
});
