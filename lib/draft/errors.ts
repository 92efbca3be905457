// lib/draft/errors.ts
import type { NameKind } from "./types";

export type DraftErrorKind =
  | "FetchError"
  | "ParseError"
  | "UnmappedNameError"
  | "RenderError"
  | "WriteError";

export type DraftErrorContext = Record<string, string | number | undefined>;

/** Base for every terminal pipeline failure. Nothing in the pipeline retries these. */
export abstract class DraftPipelineError extends Error {
  abstract readonly kind: DraftErrorKind;
  readonly context: DraftErrorContext;

  constructor(message: string, context: DraftErrorContext = {}, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.context = context;
  }
}

export class FetchError extends DraftPipelineError {
  readonly kind = "FetchError" as const;

  constructor(
    readonly year: number,
    readonly url: string,
    detail: string,
    readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(`could not fetch ${year} draft page ${url}: ${detail}`, { year, url, status }, options);
  }
}

export class ParseError extends DraftPipelineError {
  readonly kind = "ParseError" as const;

  constructor(message: string, context: DraftErrorContext = {}) {
    super(message, context);
  }
}

export class UnmappedNameError extends DraftPipelineError {
  readonly kind = "UnmappedNameError" as const;

  constructor(
    readonly rawName: string,
    readonly nameKind: NameKind,
    readonly pickNumber?: number
  ) {
    const where = pickNumber === undefined ? "" : ` (pick ${pickNumber})`;
    super(`unmapped ${nameKind} name "${rawName}"${where}`, {
      raw: rawName,
      kind: nameKind,
      pick: pickNumber,
    });
  }
}

export class RenderError extends DraftPipelineError {
  readonly kind = "RenderError" as const;

  constructor(message: string, context: DraftErrorContext = {}) {
    super(message, context);
  }
}

export class WriteError extends DraftPipelineError {
  readonly kind = "WriteError" as const;

  constructor(readonly targetPath: string, options?: { cause?: unknown }) {
    const detail = options?.cause instanceof Error ? `: ${options.cause.message}` : "";
    super(`could not write ${targetPath}${detail}`, { path: targetPath }, options);
  }
}

export function isDraftPipelineError(e: unknown): e is DraftPipelineError {
  return e instanceof DraftPipelineError;
}
