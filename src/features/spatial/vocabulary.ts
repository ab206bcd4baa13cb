import type { IndicatorLocation, IndicatorWordSummary, WordTally } from "./types.js";

/** Prepositions and demonstratives counted as spatial indicators (SpIns). */
export const SPATIAL_INDICATORS: readonly string[] = [
  "back", "across", "against", "along", "around", "at", "behind", "below",
  "besides", "by", "down", "from", "in", "into", "near", "of", "off", "on",
  "out", "outside", "over", "through", "to", "towards", "under", "underneath",
  "up", "here", "there",
];

const INDICATOR_SET = new Set(SPATIAL_INDICATORS);

export function isSpatialIndicator(word: string): boolean {
  return INDICATOR_SET.has(word.toLowerCase());
}

export function summarizeIndicatorWords(locations: readonly IndicatorLocation[]): IndicatorWordSummary {
  const counts = new Map<string, number>();
  for (const loc of locations) {
    const w = loc.word.toLowerCase();
    counts.set(w, (counts.get(w) ?? 0) + 1);
  }
  const tallies: WordTally[] = Array.from(counts.entries())
    .map(([word, count]) => ({ word, count }))
    .sort((a, b) => b.count - a.count || a.word.localeCompare(b.word));
  const unknown = tallies.map(t => t.word).filter(w => !isSpatialIndicator(w));
  return { tallies, unknown };
}
