// Chart backends for the segment histogram.
// Plain-text output only (terminal bars, markdown table, JSON); renderers never see the pipeline.

import type { HistogramBar, SegmentHistogram } from "./types.js";
import { toBars } from "./segment-histogram.js";

export type ChartFormat = "ascii" | "markdown" | "json";

export interface ChartSpec {
  title: string;
  xLabel: string;
  yLabel: string;
  bars: HistogramBar[];
}

export interface ChartRenderer {
  readonly format: ChartFormat;
  render(spec: ChartSpec): string;
}

export const CHART_TITLE = "Frequency distribution of Spatial Indicators";
export const Y_LABEL = "Frequency of SpIns per segment";

export function buildChartSpec(histogram: SegmentHistogram): ChartSpec {
  return {
    title: CHART_TITLE,
    xLabel: `Total characters in text divided into ${histogram.segments.length} segments`,
    yLabel: Y_LABEL,
    bars: toBars(histogram),
  };
}

// ---- ASCII (vertical bars) ----------------------------------------------
export class AsciiChartRenderer implements ChartRenderer {
  readonly format = "ascii" as const;

  constructor(private readonly height: number = 12) {}

  render(spec: ChartSpec): string {
    const counts = spec.bars.map(b => b.count);
    const max = Math.max(0, ...counts);
    const rows = Math.min(this.height, max);
    const yWidth = String(max).length;

    const lines: string[] = [spec.title, `y: ${spec.yLabel}`];
    for (let r = rows; r >= 1; r--) {
      // any non-zero count fills at least the bottom row
      const floor = ((r - 1) * max) / rows;
      const cells = counts.map(c => (c > floor ? "█" : " ")).join(" ");
      const label = r === rows ? String(max) : "";
      lines.push(`${label.padStart(yWidth)} | ${cells}`.trimEnd());
    }
    lines.push(`${" ".repeat(yWidth)} +${"-".repeat(counts.length * 2)}`);
    lines.push(tickLine(spec.bars, yWidth));
    lines.push(`x: ${spec.xLabel}`);
    return lines.join("\n");
  }
}

/** Segment numbers under the first column, every fifth column and the last one. */
function tickLine(bars: HistogramBar[], yWidth: number): string {
  const chars: string[] = Array.from({ length: yWidth + 3 + bars.length * 2 }, () => " ");
  let nextFree = 0;
  bars.forEach((b, i) => {
    const isLast = i === bars.length - 1;
    if (i !== 0 && b.segment % 5 !== 0 && !isLast) return;
    const pos = yWidth + 3 + i * 2;
    if (pos < nextFree) return;
    const label = String(b.segment);
    for (let j = 0; j < label.length; j++) chars[pos + j] = label.charAt(j);
    nextFree = pos + label.length + 1;
  });
  return chars.join("").trimEnd();
}

// ---- Markdown table -----------------------------------------------------
export class MarkdownChartRenderer implements ChartRenderer {
  readonly format = "markdown" as const;

  render(spec: ChartSpec): string {
    const lines: string[] = [];
    lines.push(`## ${spec.title}`);
    lines.push("");
    lines.push(spec.xLabel);
    lines.push("");
    lines.push(`| Segment | ${spec.yLabel} |`);
    lines.push("| ---: | ---: |");
    for (const b of spec.bars) lines.push(`| ${b.segment} | ${b.count} |`);
    lines.push("");
    return lines.join("\n");
  }
}

// ---- JSON -------------------------------------------------------------
export class JsonChartRenderer implements ChartRenderer {
  readonly format = "json" as const;

  render(spec: ChartSpec): string {
    return JSON.stringify(spec, null, 2);
  }
}

export function createChartRenderer(format: ChartFormat, opts: { height?: number } = {}): ChartRenderer {
  switch (format) {
    case "ascii":
      return new AsciiChartRenderer(opts.height);
    case "markdown":
      return new MarkdownChartRenderer();
    case "json":
      return new JsonChartRenderer();
  }
}
