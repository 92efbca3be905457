// lib/draft/pipeline.ts
import path from "node:path";
import { aggregatePicks, totalPicks } from "./aggregate";
import { createColorLookup } from "./colors";
import type { DraftConfig } from "./config";
import { conferenceScopeLabel, filterByConference } from "./conferences";
import { writeCountsCsv } from "./csv";
import { liveFetcher, scrapeDraftPicks, type HtmlFetcher } from "./extract";
import type { Lookups } from "./lookups";
import { createNameResolver } from "./names";
import { buildSankeyDocument, renderSankeyHtml, writeSankeyHtml } from "./sankey";
import type { ConferenceMode, DraftPick, FlowEdgeCount } from "./types";

export type PipelineParams = {
  year: number;
  outDir: string;
  conferences?: ConferenceMode;
  config: DraftConfig;
  lookups: Lookups;
  /** Override the page fetch (tests, cached HTML). Defaults to a live GET. */
  fetchHtml?: HtmlFetcher;
};

export type PipelineResult = {
  picks: ReadonlyArray<DraftPick>;
  edges: ReadonlyArray<FlowEdgeCount>;
  csvPath: string;
  htmlPath: string;
};

export function countsCsvPath(outDir: string, year: number): string {
  return path.join(outDir, `cfb_nfl_counts_${year}.csv`);
}

export function sankeyHtmlPath(outDir: string, year: number): string {
  return path.join(outDir, `cfb_sankey_${year}.html`);
}

export function chartTitle(year: number, mode: ConferenceMode): string {
  return `From Saturdays to Sundays: ${conferenceScopeLabel(mode)} in the ${year} NFL Draft`;
}

export async function runPipeline(params: PipelineParams): Promise<PipelineResult> {
  const { year, outDir, config, lookups } = params;
  const mode = params.conferences ?? "all";
  const fetchHtml = params.fetchHtml ?? liveFetcher(config);

  console.log(`[pipeline] start year=${year} confs=${mode} out=${outDir}`);

  const scraped = await scrapeDraftPicks(year, fetchHtml);

  const resolver = createNameResolver(lookups);
  const picks = filterByConference(scraped, mode, resolver, lookups);
  const edges = aggregatePicks(picks, resolver);

  const csvPath = countsCsvPath(outDir, year);
  await writeCountsCsv(csvPath, edges);

  const doc = buildSankeyDocument(edges, createColorLookup(lookups), {
    title: chartTitle(year, mode),
    subtitle: "Data: Wikipedia NFL Draft Pages",
  });
  const htmlPath = sankeyHtmlPath(outDir, year);
  await writeSankeyHtml(
    htmlPath,
    renderSankeyHtml(doc, { width: config.sankeyWidth, height: config.sankeyHeight })
  );

  console.log(`[pipeline] done: ${totalPicks(edges)} picks across ${edges.length} pairs`);
  return { picks, edges, csvPath, htmlPath };
}
