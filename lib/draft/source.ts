// lib/draft/source.ts
import type { DraftConfig } from "./config";
import { FetchError } from "./errors";

export function draftPageUrl(year: number, baseUrl: string): string {
  return `${baseUrl}/${year}_NFL_Draft`;
}

/** One GET with a timeout. No retries: callers decide whether to run again. */
export async function fetchDraftPage(
  year: number,
  cfg: Pick<DraftConfig, "sourceBaseUrl" | "timeoutMs" | "userAgent">
): Promise<string> {
  const url = draftPageUrl(year, cfg.sourceBaseUrl);
  const ac = new AbortController();
  const t = setTimeout(() => ac.abort(), cfg.timeoutMs);

  try {
    let res: Response;
    try {
      res = await fetch(url, {
        method: "GET",
        redirect: "follow",
        headers: {
          "user-agent": cfg.userAgent,
          "accept": "text/html,application/xhtml+xml",
        },
        signal: ac.signal,
      });
    } catch (err) {
      const detail = ac.signal.aborted
        ? `timed out after ${cfg.timeoutMs}ms`
        : err instanceof Error
          ? err.message
          : String(err);
      throw new FetchError(year, url, detail, undefined, { cause: err });
    }

    if (!res.ok) throw new FetchError(year, url, `HTTP ${res.status}`, res.status);

    try {
      return await res.text();
    } catch (err) {
      throw new FetchError(year, url, "response body could not be read", res.status, { cause: err });
    }
  } finally {
    clearTimeout(t);
  }
}
