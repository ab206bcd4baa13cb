import { describe, it, expect } from 'vitest';
import {
  AsciiChartRenderer,
  buildChartSpec,
  createChartRenderer,
  JsonChartRenderer,
  MarkdownChartRenderer,
} from '../src/features/spatial/chart-renderer.js';
import type { ChartSpec } from '../src/features/spatial/chart-renderer.js';
import { buildSegmentHistogram } from '../src/features/spatial/segment-histogram.js';

function specOf(counts: number[]): ChartSpec {
  return {
    title: 'Frequency distribution of Spatial Indicators',
    xLabel: `Total characters in text divided into ${counts.length} segments`,
    yLabel: 'Frequency of SpIns per segment',
    bars: counts.map((count, i) => ({ segment: i + 1, count })),
  };
}

describe('buildChartSpec', () => {
  it('carries the fixed title, labels and ordered bars', () => {
    // 9 chars in 3 segments: [0, 3) [3, 6) [6, 9)
    const spec = buildChartSpec(buildSegmentHistogram([4, 5, 8], 9, 3));
    expect(spec).toEqual(specOf([0, 2, 1]));
  });
});

describe('AsciiChartRenderer', () => {
  it('draws one column per segment with the peak labelled', () => {
    const out = new AsciiChartRenderer().render(specOf([0, 2, 1]));
    expect(out.split('\n')).toEqual([
      'Frequency distribution of Spatial Indicators',
      'y: Frequency of SpIns per segment',
      '2 |   █',
      '  |   █ █',
      '  +------',
      '    1   3',
      'x: Total characters in text divided into 3 segments',
    ]);
  });

  it('scales tall bars down to the configured height', () => {
    const lines = new AsciiChartRenderer(2).render(specOf([4, 1, 2])).split('\n');
    expect(lines.slice(2, 4)).toEqual(['4 | █', '  | █ █ █']);
  });

  it('keeps small counts visible next to a tall bar', () => {
    const lines = new AsciiChartRenderer().render(specOf([30, 1, 2, 0])).split('\n');
    expect(lines[2]).toBe('30 | █');
    expect(lines[12]).toBe('   | █');
    expect(lines[13]).toBe('   | █ █ █');
  });

  it('labels the first, every fifth and the last segment', () => {
    const lines = new AsciiChartRenderer().render(specOf(Array.from({ length: 12 }, () => 1))).split('\n');
    expect(lines[4]).toBe('    1       5         10  12');
  });

  it('draws only the axis when every count is zero', () => {
    const lines = new AsciiChartRenderer().render(specOf([0, 0])).split('\n');
    expect(lines.slice(2, 4)).toEqual(['  +----', '    1 2']);
  });
});

describe('MarkdownChartRenderer', () => {
  it('renders a segment table', () => {
    expect(new MarkdownChartRenderer().render(specOf([3, 0]))).toBe([
      '## Frequency distribution of Spatial Indicators',
      '',
      'Total characters in text divided into 2 segments',
      '',
      '| Segment | Frequency of SpIns per segment |',
      '| ---: | ---: |',
      '| 1 | 3 |',
      '| 2 | 0 |',
      '',
    ].join('\n'));
  });
});

describe('JsonChartRenderer', () => {
  it('serializes the chart spec', () => {
    const spec = specOf([1, 2]);
    expect(JSON.parse(new JsonChartRenderer().render(spec))).toEqual(spec);
  });
});

describe('createChartRenderer', () => {
  it('picks the backend by format', () => {
    expect(createChartRenderer('ascii')).toBeInstanceOf(AsciiChartRenderer);
    expect(createChartRenderer('markdown').format).toBe('markdown');
    expect(createChartRenderer('json').format).toBe('json');
  });
});
