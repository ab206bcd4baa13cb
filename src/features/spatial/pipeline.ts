import type {
  BoundaryMode,
  DuplicateSnippet,
  IndicatorLocation,
  IndicatorWordSummary,
  MissingSnippet,
  SegmentHistogram,
} from "./types.js";
import { normalizeText } from "./normalizer.js";
import { locateIndicators, toSnippets } from "./indicator-locator.js";
import type { LocatorOptions } from "./indicator-locator.js";
import { buildSegmentHistogram } from "./segment-histogram.js";
import { summarizeIndicatorWords } from "./vocabulary.js";
import { timed } from "../../lib/log.js";

export interface SpatialAnalysisInput {
  rawText: string;
  snippets: readonly string[];
  chunkCount: number;
  boundaryMode?: BoundaryMode;
  locator?: LocatorOptions;
}

export interface SpatialAnalysis {
  text: string;
  locations: IndicatorLocation[];
  missing: MissingSnippet[];
  duplicates: DuplicateSnippet[];
  histogram: SegmentHistogram;
  words: IndicatorWordSummary;
  warnings: string[];
}

/**
 * Pure in-memory run: normalize, locate, bin, summarize. Does not touch FS.
 */
export function runSpatialAnalysis(input: SpatialAnalysisInput): SpatialAnalysis {
  const text = timed("normalizeText", () => normalizeText(input.rawText));
  const snippets = toSnippets(input.snippets);
  const { locations, missing, duplicates } = timed("locateIndicators", () =>
    locateIndicators(text, snippets, input.locator)
  );
  const histogram = timed("buildSegmentHistogram", () =>
    buildSegmentHistogram(locations.map(l => l.offset), text.length, input.chunkCount, input.boundaryMode)
  );
  const words = summarizeIndicatorWords(locations);

  const warnings: string[] = [];
  for (const m of missing) {
    warnings.push(m.reason === "not-found"
      ? `snippet #${m.snippetIndex + 1} not found: "${m.snippet}"`
      : `snippet #${m.snippetIndex + 1} ends the text, no indicator follows: "${m.snippet}"`);
  }
  for (const d of duplicates) {
    warnings.push(`snippet #${d.snippetIndex + 1} starts at the same offset (${d.snippetOffset}) as snippet #${d.firstIndex + 1}`);
  }
  if (words.unknown.length) {
    warnings.push(`words outside the spatial indicator list: ${words.unknown.join(", ")}`);
  }

  return { text, locations, missing, duplicates, histogram, words, warnings };
}
