// lib/draft/sankey.ts
// Counts table → Sankey document → standalone HTML (inline SVG, no scripts).
import { sankey, sankeyLinkHorizontal, type SankeyNode } from "d3-sankey";
import he from "he";
import { hexToRgba, type ColorLookup } from "./colors";
import { RenderError } from "./errors";
import { writeFileAtomic } from "./fs";
import type { FlowEdgeCount } from "./types";

export type SankeyDocNode = Readonly<{
  name: string;
  kind: "college" | "team";
  color: string;
}>;

export type SankeyDocLink = Readonly<{
  source: number; // index into nodes
  target: number;
  value: number;
  label: string; // player names, pick order
  color: string;
  college: string;
  team: string;
}>;

export type SankeyDocument = Readonly<{
  title: string;
  subtitle?: string;
  nodes: ReadonlyArray<SankeyDocNode>;
  links: ReadonlyArray<SankeyDocLink>;
}>;

export const PLAYER_LABEL_SEPARATOR = "; ";

/* ───────────────────────── Document ───────────────────────── */

export function buildSankeyDocument(
  edges: ReadonlyArray<FlowEdgeCount>,
  colors: ColorLookup,
  opts: { title: string; subtitle?: string }
): SankeyDocument {
  if (edges.length === 0) {
    throw new RenderError("nothing to visualize: the counts table has no edges", { title: opts.title });
  }

  const colleges: string[] = [];
  const teams: string[] = [];
  const collegeIdx = new Map<string, number>();
  const teamIdx = new Map<string, number>();

  for (const e of edges) {
    if (!Number.isInteger(e.count) || e.count < 1 || e.players.length === 0) {
      throw new RenderError(`malformed edge ${e.college} → ${e.nfl_team} (count ${e.count})`, {
        college: e.college,
        team: e.nfl_team,
      });
    }
    if (!collegeIdx.has(e.college)) {
      collegeIdx.set(e.college, colleges.length);
      colleges.push(e.college);
    }
    if (!teamIdx.has(e.nfl_team)) {
      teamIdx.set(e.nfl_team, teams.length);
      teams.push(e.nfl_team);
    }
  }

  const nodes: SankeyDocNode[] = [
    ...colleges.map((name) => ({ name, kind: "college" as const, color: colors.college(name) })),
    ...teams.map((name) => ({ name, kind: "team" as const, color: colors.team(name) })),
  ];

  const links = edges.map((e): SankeyDocLink => {
    const source = collegeIdx.get(e.college);
    const team = teamIdx.get(e.nfl_team);
    if (source === undefined || team === undefined) {
      throw new RenderError(`no node for edge ${e.college} → ${e.nfl_team}`, {
        college: e.college,
        team: e.nfl_team,
      });
    }
    return {
      source,
      target: colleges.length + team,
      value: e.count,
      label: e.players.join(PLAYER_LABEL_SEPARATOR),
      color: hexToRgba(colors.college(e.college), 0.45),
      college: e.college,
      team: e.nfl_team,
    };
  });

  return Object.freeze({
    title: opts.title,
    subtitle: opts.subtitle,
    nodes: Object.freeze(nodes),
    links: Object.freeze(links),
  });
}

/* ───────────────────────── Layout + HTML ───────────────────────── */

type NodeDatum = { name: string; kind: "college" | "team"; color: string };
type LinkDatum = { label: string; color: string; college: string; team: string };

export type RenderOptions = { width: number; height: number };

const HEADER_PX = 10;
const LABEL_GAP = 6;
const NODE_WIDTH = 18;
const NODE_PADDING = 15;
const MIN_NODE_PX = 6;

/**
 * d3-sankey shrinks padding to fit the tallest column and, once that column is
 * crowded enough, leaves no room for the nodes themselves. Grow the canvas so
 * every node in the tallest column keeps at least MIN_NODE_PX.
 */
export function layoutHeight(doc: SankeyDocument, minHeight: number): number {
  let colleges = 0;
  let teams = 0;
  for (const n of doc.nodes) {
    if (n.kind === "college") colleges += 1;
    else teams += 1;
  }
  const tallest = Math.max(colleges, teams);
  return Math.max(minHeight, tallest * (NODE_PADDING + MIN_NODE_PX) + 2 * HEADER_PX);
}

function px(n: number | undefined): string {
  return (n ?? 0).toFixed(2);
}

function esc(s: string): string {
  return he.escape(s);
}

function nodeName(n: number | string | SankeyNode<NodeDatum, LinkDatum>): string {
  return typeof n === "object" ? n.name : String(n);
}

export function linkTooltip(l: Pick<SankeyDocLink, "label" | "college" | "team" | "value">): string {
  return [`Players: ${l.label}`, `College: ${l.college}`, `Team: ${l.team}`, `Picks: ${l.value}`].join("\n");
}

export function renderSankeyHtml(doc: SankeyDocument, opts: RenderOptions): string {
  if (doc.links.length === 0) {
    throw new RenderError("nothing to visualize: the document has no links", { title: doc.title });
  }

  const { width } = opts;
  const height = layoutHeight(doc, opts.height);
  const layout = sankey<NodeDatum, LinkDatum>()
    .nodeWidth(NODE_WIDTH)
    .nodePadding(NODE_PADDING)
    .nodeSort((a, b) => (a.index ?? 0) - (b.index ?? 0))
    .extent([
      [1, HEADER_PX],
      [width - 1, height - HEADER_PX],
    ]);

  const graph = layout({
    nodes: doc.nodes.map((n) => ({ name: n.name, kind: n.kind, color: n.color })),
    links: doc.links.map((l) => ({
      source: l.source,
      target: l.target,
      value: l.value,
      label: l.label,
      color: l.color,
      college: l.college,
      team: l.team,
    })),
  });

  const path = sankeyLinkHorizontal<NodeDatum, LinkDatum>();

  const linkEls = graph.links.map((l) => {
    const d = path(l) ?? "";
    const tip = linkTooltip({ label: l.label, college: nodeName(l.source), team: nodeName(l.target), value: l.value });
    return (
      `<path class="link" d="${esc(d)}" stroke="${esc(l.color)}" stroke-width="${px(Math.max(1, l.width ?? 1))}">` +
      `<title>${esc(tip)}</title></path>`
    );
  });

  const nodeEls = graph.nodes.map((n) => {
    const x0 = n.x0 ?? 0;
    const x1 = n.x1 ?? 0;
    const y0 = n.y0 ?? 0;
    const y1 = n.y1 ?? 0;
    const left = n.kind === "college";
    const tx = left ? x1 + LABEL_GAP : x0 - LABEL_GAP;
    const anchor = left ? "start" : "end";
    const tip = `${n.name}\n${n.kind === "college" ? "Players drafted" : "Players selected"}: ${n.value ?? 0}`;
    return (
      `<g class="node ${n.kind}">` +
      `<rect x="${px(x0)}" y="${px(y0)}" width="${px(x1 - x0)}" height="${px(Math.max(1, y1 - y0))}" fill="${esc(n.color)}">` +
      `<title>${esc(tip)}</title></rect>` +
      `<text x="${px(tx)}" y="${px((y0 + y1) / 2)}" dy="0.35em" text-anchor="${anchor}">${esc(n.name)}</text>` +
      `</g>`
    );
  });

  const subtitle = doc.subtitle ? `\n<p class="subtitle">${esc(doc.subtitle)}</p>` : "";

  return [
    "<!DOCTYPE html>",
    '<html lang="en">',
    "<head>",
    '<meta charset="utf-8">',
    '<meta name="viewport" content="width=device-width, initial-scale=1">',
    `<title>${esc(doc.title)}</title>`,
    "<style>",
    "body { font-family: system-ui, -apple-system, 'Segoe UI', sans-serif; margin: 16px; color: #222; }",
    "h1 { font-size: 20px; margin: 0 0 4px; }",
    ".subtitle { font-size: 12px; color: #666; margin: 0 0 12px; }",
    ".link { fill: none; }",
    ".link:hover { stroke-opacity: 1; filter: brightness(0.85); }",
    ".node rect { stroke: #000; stroke-width: 0.3; }",
    ".node text { font-size: 12px; pointer-events: none; }",
    "</style>",
    "</head>",
    "<body>",
    `<h1>${esc(doc.title)}</h1>${subtitle}`,
    `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}" role="img" aria-label="${esc(doc.title)}">`,
    `<g class="links">${linkEls.join("")}</g>`,
    `<g class="nodes">${nodeEls.join("")}</g>`,
    "</svg>",
    "</body>",
    "</html>",
    "",
  ].join("\n");
}

export async function writeSankeyHtml(target: string, html: string): Promise<void> {
  await writeFileAtomic(target, html);
  console.log(`[render] wrote ${target}`);
}
