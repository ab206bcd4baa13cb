// src/features/spatial/segment-histogram.ts
import type { BoundaryMode, HistogramBar, SegmentCount, SegmentHistogram } from "./types.js";

/**
 * Split [0, textLength) into chunkCount segments of ceil(textLength / chunkCount)
 * characters and count the offsets that fall in each.
 *
 * half-open: segment k is [(k-1)L, kL); the last one also takes anything up to textLength.
 * legacy:    inclusive at both ends, kept for parity with earlier charts. Segment 1 is [0, L];
 *            segment k > 1 ends at kL + (k-1) and starts L before that, so every
 *            segment covers L + 1 positions and the grid drifts right by one per segment.
 */
export function buildSegmentHistogram(
  offsets: readonly number[],
  textLength: number,
  chunkCount: number,
  mode: BoundaryMode = "half-open"
): SegmentHistogram {
  if (!Number.isInteger(chunkCount) || chunkCount < 1) {
    throw new RangeError(`chunkCount must be a positive integer, got ${chunkCount}`);
  }
  const chunkLength = Math.ceil(textLength / chunkCount);
  const segments: SegmentCount[] = [];

  for (let k = 1; k <= chunkCount; k++) {
    const { start, end } = mode === "legacy"
      ? legacyBounds(k, chunkLength)
      : halfOpenBounds(k, chunkLength, chunkCount, textLength);
    const inSegment = mode === "legacy"
      ? (o: number) => start <= o && o <= end
      : (o: number) => start <= o && o < end;

    let count = 0;
    for (const o of offsets) if (inSegment(o)) count++;
    segments.push({ index: k, start, end, count });
  }

  return { mode, chunkLength, textLength, segments };
}

function halfOpenBounds(k: number, chunkLength: number, chunkCount: number, textLength: number) {
  const start = (k - 1) * chunkLength;
  const end = k === chunkCount ? Math.max(k * chunkLength, textLength) : k * chunkLength;
  return { start, end };
}

function legacyBounds(k: number, chunkLength: number) {
  const end = k === 1 ? chunkLength : chunkLength * k + (k - 1);
  return { start: end - chunkLength, end };
}

/** Segment index -> count, in numeric order. */
export function toCountMap(histogram: SegmentHistogram): Map<number, number> {
  return new Map(histogram.segments.map(s => [s.index, s.count]));
}

export function toBars(histogram: SegmentHistogram): HistogramBar[] {
  return histogram.segments.map(s => ({ segment: s.index, count: s.count }));
}

export function totalCount(histogram: SegmentHistogram): number {
  return histogram.segments.reduce((acc, s) => acc + s.count, 0);
}
