import { describe, it, expect } from 'vitest';
import { locateIndicators, toSnippets, wordAt } from '../src/features/spatial/indicator-locator.js';
import { normalizeText } from '../src/features/spatial/normalizer.js';
import { IndicatorOutOfRangeError, SnippetNotFoundError } from '../src/features/spatial/errors.js';

const BARN = 'we ran into the barn then hid under the hay';

describe('locateIndicators', () => {
  it('places the indicator one character after the snippet', () => {
    const { locations } = locateIndicators('the cat sat on the mat', toSnippets(['the cat sat ']));
    expect(locations).toEqual([
      { snippetIndex: 0, snippet: 'the cat sat', snippetOffset: 0, snippetLength: 11, offset: 12, word: 'on' },
    ]);
  });

  it('keeps snippet input order rather than text order', () => {
    const { locations } = locateIndicators(BARN, toSnippets(['then hid', 'we ran']));
    expect(locations.map(l => l.offset)).toEqual([30, 7]);
    expect(locations.map(l => l.word)).toEqual(['under', 'into']);
  });

  it('processes the last snippet unless told otherwise', () => {
    const snippets = toSnippets(['then hid', 'we ran']);
    expect(locateIndicators(BARN, snippets).locations).toHaveLength(2);
    // legacy runs never looked up the final row
    const legacy = locateIndicators(BARN, snippets, { includeLastSnippet: false });
    expect(legacy.locations.map(l => l.offset)).toEqual([30]);
  });

  it('throws SnippetNotFoundError instead of emitting a negative offset', () => {
    const snippets = toSnippets(['we ran', 'over the moon']);
    expect(() => locateIndicators(BARN, snippets)).toThrow(SnippetNotFoundError);
    expect(() => locateIndicators(BARN, snippets)).toThrow('Snippet #2 not found in text: "over the moon"');
  });

  it('records unmatched snippets when skipping', () => {
    const result = locateIndicators(BARN, toSnippets(['we ran', 'over the moon', 'the hay']), { onMissing: 'skip' });
    expect(result.locations.map(l => l.offset)).toEqual([7]);
    expect(result.missing).toEqual([
      { snippetIndex: 1, snippet: 'over the moon', reason: 'not-found' },
      { snippetIndex: 2, snippet: 'the hay', reason: 'past-end' },
    ]);
  });

  it('rejects a snippet that ends the text', () => {
    expect(() => locateIndicators(BARN, toSnippets(['the hay']))).toThrow(IndicatorOutOfRangeError);
    expect(locateIndicators(BARN, toSnippets(['under the'])).locations[0]?.word).toBe('hay');
  });

  it('keeps snippets sharing a start offset and reports them as duplicates', () => {
    const result = locateIndicators(BARN, toSnippets(['we ran', 'we ran into']));
    expect(result.locations.map(l => l.offset)).toEqual([7, 12]);
    expect(result.duplicates).toEqual([{ snippetIndex: 1, firstIndex: 0, snippetOffset: 0 }]);
  });

  it('treats a snippet that normalizes to nothing as not found', () => {
    const snippets = toSnippets(['42!']);
    expect(snippets[0]?.text).toBe('');
    expect(() => locateIndicators(BARN, snippets)).toThrow(SnippetNotFoundError);
  });

  it('matches snippets containing typographic apostrophes against normalized text', () => {
    const text = normalizeText('the Rabbit’s hole in the ground');
    const { locations } = locateIndicators(text, toSnippets(['Rabbit’s hole']));
    expect(locations[0]?.snippetOffset).toBe(4);
    expect(locations[0]?.offset).toBe(18);
    expect(locations[0]?.word).toBe('in');
  });

  it('reproduces known offsets for a synthetic text', () => {
    const tags = ['ka', 'kb', 'kc', 'kd', 'ke'];
    const indicators = ['in', 'on', 'at', 'by', 'up'];
    let text = '';
    const snippets: string[] = [];
    const expected: number[] = [];
    tags.forEach((tag, i) => {
      if (text) text += ' ';
      const snippet = [tag, `${tag}b`, `${tag}c`, `${tag}d`, `${tag}e`].join(' ');
      snippets.push(snippet);
      text += snippet;
      expected.push(text.length + 1);
      text += ` ${indicators[i]}`;
    });
    const { locations } = locateIndicators(text, toSnippets(snippets));
    expect(locations.map(l => l.offset)).toEqual(expected);
    expect(locations.map(l => l.word)).toEqual(indicators);
  });
});

describe('wordAt', () => {
  it('reads up to the next space or the end of text', () => {
    expect(wordAt('on the mat', 0)).toBe('on');
    expect(wordAt('on the mat', 7)).toBe('mat');
  });
});
