// src/features/spatial/types.ts

export type BoundaryMode = "half-open" | "legacy";

export interface Snippet {
  index: number;   // 0-based position among loaded snippets
  raw: string;     // cell value as read
  text: string;    // normalized form used for searching
}

export interface IndicatorLocation {
  snippetIndex: number;
  snippet: string;       // normalized snippet text
  snippetOffset: number; // first char of snippet in normalized text
  snippetLength: number;
  offset: number;        // snippetOffset + snippetLength + 1
  word: string;          // token starting at offset
}

export type MissingReason = "not-found" | "past-end";

export interface MissingSnippet {
  snippetIndex: number;
  snippet: string;
  reason: MissingReason;
}

export interface DuplicateSnippet {
  snippetIndex: number;
  firstIndex: number;    // earlier snippet sharing the start offset
  snippetOffset: number;
}

export interface LocatorResult {
  locations: IndicatorLocation[];
  missing: MissingSnippet[];
  duplicates: DuplicateSnippet[];
}

export interface SegmentCount {
  index: number; // 1-based
  start: number;
  end: number;   // exclusive in half-open mode, inclusive in legacy mode
  count: number;
}

export interface SegmentHistogram {
  mode: BoundaryMode;
  chunkLength: number;
  textLength: number;
  segments: SegmentCount[];
}

export interface HistogramBar {
  segment: number;
  count: number;
}

export interface WordTally {
  word: string;
  count: number;
}

export interface IndicatorWordSummary {
  tallies: WordTally[];
  unknown: string[];
}
