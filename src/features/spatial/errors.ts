// Domain errors for the spatial relation pipeline.
// Each carries a stable code so the reporter can categorize without string matching.

export type SpatialErrorCode =
  | "TEXT_SOURCE"
  | "SNIPPET_SOURCE"
  | "SNIPPET_NOT_FOUND"
  | "INDICATOR_OUT_OF_RANGE"
  | "CONFIGURATION";

export class SpatialAnalysisError extends Error {
  constructor(
    message: string,
    public readonly code: SpatialErrorCode,
    public readonly context: Record<string, unknown> = {}
  ) {
    super(message);
    this.name = "SpatialAnalysisError";
  }
}

export class TextSourceError extends SpatialAnalysisError {
  constructor(public readonly path: string, cause?: unknown) {
    super(`Cannot read text file "${path}": ${describeCause(cause)}`, "TEXT_SOURCE", { path });
    this.name = "TextSourceError";
  }
}

export type SnippetSourceReason = "file-not-found" | "sheet-not-found" | "column-not-found" | "unreadable";

export class SnippetSourceError extends SpatialAnalysisError {
  constructor(
    message: string,
    public readonly reason: SnippetSourceReason,
    context: Record<string, unknown> = {}
  ) {
    super(message, "SNIPPET_SOURCE", { reason, ...context });
    this.name = "SnippetSourceError";
  }
}

export class SnippetNotFoundError extends SpatialAnalysisError {
  constructor(public readonly snippetIndex: number, public readonly snippet: string) {
    super(`Snippet #${snippetIndex + 1} not found in text: "${snippet}"`, "SNIPPET_NOT_FOUND", { snippetIndex, snippet });
    this.name = "SnippetNotFoundError";
  }
}

export class IndicatorOutOfRangeError extends SpatialAnalysisError {
  constructor(
    public readonly snippetIndex: number,
    public readonly snippet: string,
    public readonly offset: number,
    textLength: number
  ) {
    super(
      `No indicator follows snippet #${snippetIndex + 1} ("${snippet}"): offset ${offset} is past the end of the text (${textLength} chars)`,
      "INDICATOR_OUT_OF_RANGE",
      { snippetIndex, snippet, offset, textLength }
    );
    this.name = "IndicatorOutOfRangeError";
  }
}

export class ConfigurationError extends SpatialAnalysisError {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration:\n  - ${issues.join("\n  - ")}`, "CONFIGURATION", { issues });
    this.name = "ConfigurationError";
  }
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  return cause === undefined ? "unknown error" : String(cause);
}
